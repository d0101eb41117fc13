import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";

export type AssetCheckinData = {
  assetId: string;
  employeeId: string;
  physicalState: string;
  performanceSatisfaction: number | null;
  notes: string;
};
/** `createdAt` is the check-in date. */
export type AssetCheckin = Stored<AssetCheckinData>;

type AssetCheckinRecord = Omit<AssetCheckinData, "assetId" | "employeeId"> & {
  assetId: Types.ObjectId;
  employeeId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const assetCheckinSchema = new mongoose.Schema<AssetCheckinRecord>(
  {
    assetId: { type: mongoose.Schema.Types.ObjectId, ref: "Asset", required: true, index: true },
    employeeId: { type: mongoose.Schema.Types.ObjectId, ref: "Employee", required: true, index: true },
    physicalState: { type: String, required: true, trim: true },
    performanceSatisfaction: { type: Number, default: null, min: 1, max: 5 },
    notes: { type: String, trim: true, default: "" },
  },
  { timestamps: true }
);

export const AssetCheckinModel = mongoose.model<AssetCheckinRecord>("AssetCheckin", assetCheckinSchema);

export function toAssetCheckin(doc: HydratedDocument<AssetCheckinRecord>): AssetCheckin {
  return {
    id: doc._id.toString(),
    assetId: doc.assetId.toString(),
    employeeId: doc.employeeId.toString(),
    physicalState: doc.physicalState,
    performanceSatisfaction: doc.performanceSatisfaction ?? null,
    notes: doc.notes,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
