import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";
import { refId } from "./common.js";

export const obsolescenceRulesKey = "default";

export type ObsolescenceRulesData = {
  /** Always `obsolescenceRulesKey`; the unique index keeps the record a singleton. */
  key: string;
  windowsMinVersion: string;
  ramMinGb: number;
  diskMinFreePercent: number;
  enabled: boolean;
  updatedById: string | null;
};
export type ObsolescenceRules = Stored<ObsolescenceRulesData>;

type ObsolescenceRulesRecord = Omit<ObsolescenceRulesData, "updatedById"> & {
  updatedById: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
};

const obsolescenceRulesSchema = new mongoose.Schema<ObsolescenceRulesRecord>(
  {
    key: { type: String, required: true, unique: true, default: obsolescenceRulesKey },
    windowsMinVersion: { type: String, required: true, trim: true },
    ramMinGb: { type: Number, required: true, min: 0 },
    diskMinFreePercent: { type: Number, required: true, min: 0, max: 100 },
    enabled: { type: Boolean, default: true },
    updatedById: { type: mongoose.Schema.Types.ObjectId, ref: "User", default: null },
  },
  { timestamps: true }
);

export const ObsolescenceRulesModel = mongoose.model<ObsolescenceRulesRecord>(
  "ObsolescenceRules",
  obsolescenceRulesSchema
);

export function toObsolescenceRules(doc: HydratedDocument<ObsolescenceRulesRecord>): ObsolescenceRules {
  return {
    id: doc._id.toString(),
    key: doc.key,
    windowsMinVersion: doc.windowsMinVersion,
    ramMinGb: doc.ramMinGb,
    diskMinFreePercent: doc.diskMinFreePercent,
    enabled: doc.enabled,
    updatedById: refId(doc.updatedById),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
