import mongoose, { type HydratedDocument } from "mongoose";

import type { Stored } from "../store/types.js";

export type DepartmentData = {
  name: string;
};
export type Department = Stored<DepartmentData>;

type DepartmentRecord = DepartmentData & { createdAt: Date; updatedAt: Date };

const departmentSchema = new mongoose.Schema<DepartmentRecord>(
  {
    name: { type: String, required: true, trim: true, unique: true },
  },
  { timestamps: true }
);

export const DepartmentModel = mongoose.model<DepartmentRecord>("Department", departmentSchema);

export function toDepartment(doc: HydratedDocument<DepartmentRecord>): Department {
  return { id: doc._id.toString(), name: doc.name, createdAt: doc.createdAt, updatedAt: doc.updatedAt };
}
