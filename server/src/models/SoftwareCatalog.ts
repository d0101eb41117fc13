import mongoose, { type HydratedDocument } from "mongoose";

import type { Stored } from "../store/types.js";

export type SoftwareCatalogData = {
  name: string;
  developer: string;
};
export type SoftwareCatalog = Stored<SoftwareCatalogData>;

type SoftwareCatalogRecord = SoftwareCatalogData & { createdAt: Date; updatedAt: Date };

const softwareCatalogSchema = new mongoose.Schema<SoftwareCatalogRecord>(
  {
    name: { type: String, required: true, trim: true },
    developer: { type: String, trim: true, default: "" },
  },
  { timestamps: true }
);

softwareCatalogSchema.index({ name: 1, developer: 1 }, { unique: true });

export const SoftwareCatalogModel = mongoose.model<SoftwareCatalogRecord>("SoftwareCatalog", softwareCatalogSchema);

export function toSoftwareCatalog(doc: HydratedDocument<SoftwareCatalogRecord>): SoftwareCatalog {
  return {
    id: doc._id.toString(),
    name: doc.name,
    developer: doc.developer,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
