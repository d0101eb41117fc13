import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";

export type ComputerDetailData = {
  assetId: string;
  /** BIOS/UEFI UUID reported by the agent; joins repeated reports to one machine. */
  uniqueIdentifier: string;
  osName: string;
  osVersion: string;
  osArch: string;
  cpuModel: string;
  ramGb: number | null;
  motherboardManufacturer: string;
  motherboardModel: string;
  lastUpdatedByAgent: Date | null;
};
export type ComputerDetail = Stored<ComputerDetailData>;

type ComputerDetailRecord = Omit<ComputerDetailData, "assetId"> & {
  assetId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const computerDetailSchema = new mongoose.Schema<ComputerDetailRecord>(
  {
    assetId: { type: mongoose.Schema.Types.ObjectId, ref: "Asset", required: true, unique: true },
    uniqueIdentifier: { type: String, trim: true, default: "" },
    osName: { type: String, trim: true, default: "" },
    osVersion: { type: String, trim: true, default: "" },
    osArch: { type: String, trim: true, default: "" },
    cpuModel: { type: String, trim: true, default: "" },
    ramGb: { type: Number, default: null, min: 0 },
    motherboardManufacturer: { type: String, trim: true, default: "" },
    motherboardModel: { type: String, trim: true, default: "" },
    lastUpdatedByAgent: { type: Date, default: null },
  },
  { timestamps: true }
);

computerDetailSchema.index(
  { uniqueIdentifier: 1 },
  { unique: true, partialFilterExpression: { uniqueIdentifier: { $gt: "" } } }
);

export const ComputerDetailModel = mongoose.model<ComputerDetailRecord>("ComputerDetail", computerDetailSchema);

export function toComputerDetail(doc: HydratedDocument<ComputerDetailRecord>): ComputerDetail {
  return {
    id: doc._id.toString(),
    assetId: doc.assetId.toString(),
    uniqueIdentifier: doc.uniqueIdentifier,
    osName: doc.osName,
    osVersion: doc.osVersion,
    osArch: doc.osArch,
    cpuModel: doc.cpuModel,
    ramGb: doc.ramGb ?? null,
    motherboardManufacturer: doc.motherboardManufacturer,
    motherboardModel: doc.motherboardModel,
    lastUpdatedByAgent: doc.lastUpdatedByAgent ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
