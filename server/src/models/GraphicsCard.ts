import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";

export type GraphicsCardData = {
  assetId: string;
  modelName: string;
};
export type GraphicsCard = Stored<GraphicsCardData>;

type GraphicsCardRecord = Omit<GraphicsCardData, "assetId"> & {
  assetId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const graphicsCardSchema = new mongoose.Schema<GraphicsCardRecord>(
  {
    assetId: { type: mongoose.Schema.Types.ObjectId, ref: "Asset", required: true, index: true },
    modelName: { type: String, required: true, trim: true },
  },
  { timestamps: true }
);

export const GraphicsCardModel = mongoose.model<GraphicsCardRecord>("GraphicsCard", graphicsCardSchema);

export function toGraphicsCard(doc: HydratedDocument<GraphicsCardRecord>): GraphicsCard {
  return {
    id: doc._id.toString(),
    assetId: doc.assetId.toString(),
    modelName: doc.modelName,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
