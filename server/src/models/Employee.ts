import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";
import { refId } from "./common.js";

export type EmployeeData = {
  rut: string;
  firstName: string;
  lastName: string;
  email: string;
  position: string;
  departmentId: string | null;
};
export type Employee = Stored<EmployeeData>;

type EmployeeRecord = Omit<EmployeeData, "departmentId"> & {
  departmentId: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
};

const employeeSchema = new mongoose.Schema<EmployeeRecord>(
  {
    rut: { type: String, required: true, trim: true, unique: true },
    firstName: { type: String, required: true, trim: true },
    lastName: { type: String, required: true, trim: true },
    email: { type: String, required: true, trim: true, lowercase: true, unique: true },
    position: { type: String, trim: true, default: "" },
    departmentId: { type: mongoose.Schema.Types.ObjectId, ref: "Department", default: null, index: true },
  },
  { timestamps: true }
);

export const EmployeeModel = mongoose.model<EmployeeRecord>("Employee", employeeSchema);

export function toEmployee(doc: HydratedDocument<EmployeeRecord>): Employee {
  return {
    id: doc._id.toString(),
    rut: doc.rut,
    firstName: doc.firstName,
    lastName: doc.lastName,
    email: doc.email,
    position: doc.position,
    departmentId: refId(doc.departmentId),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function employeeFullName(employee: Pick<EmployeeData, "firstName" | "lastName">): string {
  return `${employee.firstName} ${employee.lastName}`;
}
