import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";

export type LicenseData = {
  softwareId: string;
  licenseKey: string;
  purchaseDate: Date | null;
  expirationDate: Date | null;
  /** Seats; compared against the installations referencing the license when one is assigned. */
  quantity: number;
};
export type License = Stored<LicenseData>;

type LicenseRecord = Omit<LicenseData, "softwareId"> & {
  softwareId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const licenseSchema = new mongoose.Schema<LicenseRecord>(
  {
    softwareId: { type: mongoose.Schema.Types.ObjectId, ref: "SoftwareCatalog", required: true, index: true },
    licenseKey: { type: String, trim: true, default: "" },
    purchaseDate: { type: Date, default: null },
    expirationDate: { type: Date, default: null },
    quantity: { type: Number, required: true, min: 0, default: 1 },
  },
  { timestamps: true }
);

export const LicenseModel = mongoose.model<LicenseRecord>("License", licenseSchema);

export function toLicense(doc: HydratedDocument<LicenseRecord>): License {
  return {
    id: doc._id.toString(),
    softwareId: doc.softwareId.toString(),
    licenseKey: doc.licenseKey,
    purchaseDate: doc.purchaseDate ?? null,
    expirationDate: doc.expirationDate ?? null,
    quantity: doc.quantity,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function maskLicenseKey(key: string): string {
  return key.length > 4 ? `****-****-****-${key.slice(-4)}` : "Hidden";
}
