import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";
import { refId } from "./common.js";

export type InstalledSoftwareData = {
  assetId: string;
  softwareId: string;
  version: string;
  installDate: Date | null;
  licenseId: string | null;
};
export type InstalledSoftware = Stored<InstalledSoftwareData>;

type InstalledSoftwareRecord = Omit<InstalledSoftwareData, "assetId" | "softwareId" | "licenseId"> & {
  assetId: Types.ObjectId;
  softwareId: Types.ObjectId;
  licenseId: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
};

const installedSoftwareSchema = new mongoose.Schema<InstalledSoftwareRecord>(
  {
    assetId: { type: mongoose.Schema.Types.ObjectId, ref: "Asset", required: true, index: true },
    softwareId: { type: mongoose.Schema.Types.ObjectId, ref: "SoftwareCatalog", required: true, index: true },
    version: { type: String, trim: true, default: "" },
    installDate: { type: Date, default: null },
    licenseId: { type: mongoose.Schema.Types.ObjectId, ref: "License", default: null, index: true },
  },
  { timestamps: true }
);

installedSoftwareSchema.index({ assetId: 1, softwareId: 1 }, { unique: true });

export const InstalledSoftwareModel = mongoose.model<InstalledSoftwareRecord>(
  "InstalledSoftware",
  installedSoftwareSchema
);

export function toInstalledSoftware(doc: HydratedDocument<InstalledSoftwareRecord>): InstalledSoftware {
  return {
    id: doc._id.toString(),
    assetId: doc.assetId.toString(),
    softwareId: doc.softwareId.toString(),
    version: doc.version,
    installDate: doc.installDate ?? null,
    licenseId: refId(doc.licenseId),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
