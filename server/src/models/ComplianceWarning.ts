import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";
import type { JsonObject } from "../utils/json.js";
import { refId } from "./common.js";

export const warningStatuses = ["NEW", "IN_REVIEW", "RESOLVED", "FALSE_POSITIVE"] as const;
export type WarningStatus = (typeof warningStatuses)[number];

export const openWarningStatuses = ["NEW", "IN_REVIEW"] as const satisfies readonly WarningStatus[];

export const warningSources = ["agent", "scanner", "manual"] as const;
export type WarningSource = (typeof warningSources)[number];

export const warningCategories = {
  softwareVulnerable: "SOFTWARE_VULNERABLE",
  unauthorizedSoftware: "Software Ilegal/No Autorizado",
  hardwareChange: "Hardware Change",
} as const;

export type ComplianceWarningData = {
  assetId: string;
  category: string;
  description: string;
  evidence: JsonObject | null;
  status: WarningStatus;
  resolvedById: string | null;
  resolutionNotes: string;
  source: WarningSource;
};
/** `createdAt` is the detection date. */
export type ComplianceWarning = Stored<ComplianceWarningData>;

type ComplianceWarningRecord = Omit<ComplianceWarningData, "assetId" | "resolvedById"> & {
  assetId: Types.ObjectId;
  resolvedById: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
};

const complianceWarningSchema = new mongoose.Schema<ComplianceWarningRecord>(
  {
    assetId: { type: mongoose.Schema.Types.ObjectId, ref: "Asset", required: true, index: true },
    category: { type: String, required: true, trim: true, index: true },
    description: { type: String, required: true, trim: true },
    evidence: { type: mongoose.Schema.Types.Mixed, default: null },
    status: { type: String, required: true, enum: warningStatuses, default: "NEW" },
    resolvedById: { type: mongoose.Schema.Types.ObjectId, ref: "User", default: null },
    resolutionNotes: { type: String, trim: true, default: "" },
    source: { type: String, required: true, enum: warningSources, default: "manual" },
  },
  { timestamps: true, minimize: false }
);

complianceWarningSchema.index({ status: 1, createdAt: -1 });
complianceWarningSchema.index({ assetId: 1, category: 1, status: 1 });

export const ComplianceWarningModel = mongoose.model<ComplianceWarningRecord>(
  "ComplianceWarning",
  complianceWarningSchema
);

export function toComplianceWarning(doc: HydratedDocument<ComplianceWarningRecord>): ComplianceWarning {
  return {
    id: doc._id.toString(),
    assetId: doc.assetId.toString(),
    category: doc.category,
    description: doc.description,
    evidence: doc.evidence ?? null,
    status: doc.status,
    resolvedById: refId(doc.resolvedById),
    resolutionNotes: doc.resolutionNotes,
    source: doc.source,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function isOpenWarning(warning: Pick<ComplianceWarningData, "status">): boolean {
  return openWarningStatuses.some((s) => s === warning.status);
}
