import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";

export const vulnerabilitySeverities = ["CRITICAL", "HIGH", "MEDIUM", "LOW"] as const;
export type VulnerabilitySeverity = (typeof vulnerabilitySeverities)[number];

export type SoftwareVulnerabilityData = {
  softwareId: string;
  cveId: string;
  title: string;
  description: string;
  severity: VulnerabilitySeverity;
  /** Free-text note such as "< 2.5.0"; detection only uses `safeVersionFrom`. */
  affectedVersions: string;
  /** First version no longer affected. */
  safeVersionFrom: string;
  linkToDetails: string;
  discoveredDate: Date | null;
};
export type SoftwareVulnerability = Stored<SoftwareVulnerabilityData>;

type SoftwareVulnerabilityRecord = Omit<SoftwareVulnerabilityData, "softwareId"> & {
  softwareId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const softwareVulnerabilitySchema = new mongoose.Schema<SoftwareVulnerabilityRecord>(
  {
    softwareId: { type: mongoose.Schema.Types.ObjectId, ref: "SoftwareCatalog", required: true, index: true },
    cveId: { type: String, trim: true, default: "" },
    title: { type: String, required: true, trim: true },
    description: { type: String, trim: true, default: "" },
    severity: { type: String, required: true, enum: vulnerabilitySeverities, default: "MEDIUM" },
    affectedVersions: { type: String, trim: true, default: "" },
    safeVersionFrom: { type: String, required: true, trim: true },
    linkToDetails: { type: String, trim: true, default: "" },
    discoveredDate: { type: Date, default: null },
  },
  { timestamps: true }
);

export const SoftwareVulnerabilityModel = mongoose.model<SoftwareVulnerabilityRecord>(
  "SoftwareVulnerability",
  softwareVulnerabilitySchema
);

export function toSoftwareVulnerability(doc: HydratedDocument<SoftwareVulnerabilityRecord>): SoftwareVulnerability {
  return {
    id: doc._id.toString(),
    softwareId: doc.softwareId.toString(),
    cveId: doc.cveId,
    title: doc.title,
    description: doc.description,
    severity: doc.severity,
    affectedVersions: doc.affectedVersions,
    safeVersionFrom: doc.safeVersionFrom,
    linkToDetails: doc.linkToDetails,
    discoveredDate: doc.discoveredDate ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
