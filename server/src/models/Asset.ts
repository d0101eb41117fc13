import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";
import { refId } from "./common.js";

export const assetTypes = ["NOTEBOOK", "DESKTOP", "MONITOR", "PRINTER", "OTHER"] as const;
export type AssetType = (typeof assetTypes)[number];

export const computerAssetTypes = ["NOTEBOOK", "DESKTOP"] as const satisfies readonly AssetType[];

export const assetStatuses = ["IN_STORAGE", "ASSIGNED", "IN_REPAIR", "DISPOSED"] as const;
export type AssetStatus = (typeof assetStatuses)[number];

export type AssetData = {
  inventoryCode: string;
  serialNumber: string;
  assetType: AssetType;
  status: AssetStatus;
  brand: string;
  model: string;
  acquisitionDate: Date | null;
  employeeId: string | null;
  departmentId: string | null;
};
export type Asset = Stored<AssetData>;

type AssetRecord = Omit<AssetData, "employeeId" | "departmentId"> & {
  employeeId: Types.ObjectId | null;
  departmentId: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
};

const assetSchema = new mongoose.Schema<AssetRecord>(
  {
    inventoryCode: { type: String, required: true, trim: true, unique: true },
    serialNumber: { type: String, required: true, trim: true, unique: true },
    assetType: { type: String, required: true, enum: assetTypes, index: true },
    status: { type: String, required: true, enum: assetStatuses, default: "IN_STORAGE" },
    brand: { type: String, trim: true, default: "" },
    model: { type: String, trim: true, default: "" },
    acquisitionDate: { type: Date, default: null },
    employeeId: { type: mongoose.Schema.Types.ObjectId, ref: "Employee", default: null, index: true },
    departmentId: { type: mongoose.Schema.Types.ObjectId, ref: "Department", default: null, index: true },
  },
  { timestamps: true }
);

export const AssetModel = mongoose.model<AssetRecord>("Asset", assetSchema);

export function toAsset(doc: HydratedDocument<AssetRecord>): Asset {
  return {
    id: doc._id.toString(),
    inventoryCode: doc.inventoryCode,
    serialNumber: doc.serialNumber,
    assetType: doc.assetType,
    status: doc.status,
    brand: doc.brand,
    model: doc.model,
    acquisitionDate: doc.acquisitionDate ?? null,
    employeeId: refId(doc.employeeId),
    departmentId: refId(doc.departmentId),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function isComputer(asset: Pick<AssetData, "assetType">): boolean {
  return computerAssetTypes.some((t) => t === asset.assetType);
}
