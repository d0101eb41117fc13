import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";

export type StorageDeviceData = {
  assetId: string;
  model: string;
  serialNumber: string;
  capacityGb: number | null;
  freeSpaceGb: number | null;
};
export type StorageDevice = Stored<StorageDeviceData>;

type StorageDeviceRecord = Omit<StorageDeviceData, "assetId"> & {
  assetId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const storageDeviceSchema = new mongoose.Schema<StorageDeviceRecord>(
  {
    assetId: { type: mongoose.Schema.Types.ObjectId, ref: "Asset", required: true, index: true },
    model: { type: String, trim: true, default: "" },
    serialNumber: { type: String, trim: true, default: "" },
    capacityGb: { type: Number, default: null, min: 0 },
    freeSpaceGb: { type: Number, default: null, min: 0 },
  },
  { timestamps: true }
);

export const StorageDeviceModel = mongoose.model<StorageDeviceRecord>("StorageDevice", storageDeviceSchema);

export function toStorageDevice(doc: HydratedDocument<StorageDeviceRecord>): StorageDevice {
  return {
    id: doc._id.toString(),
    assetId: doc.assetId.toString(),
    model: doc.model,
    serialNumber: doc.serialNumber,
    capacityGb: doc.capacityGb ?? null,
    freeSpaceGb: doc.freeSpaceGb ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
