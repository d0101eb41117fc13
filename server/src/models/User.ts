import mongoose, { type HydratedDocument } from "mongoose";

import type { Stored } from "../store/types.js";

export const userRoles = ["technician", "admin"] as const;
export type UserRole = (typeof userRoles)[number];

export type UserData = {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isActive: boolean;
  passwordHash: string;
};
export type User = Stored<UserData>;

type UserRecord = UserData & { createdAt: Date; updatedAt: Date };

const userSchema = new mongoose.Schema<UserRecord>(
  {
    username: { type: String, required: true, unique: true, trim: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    firstName: { type: String, trim: true, default: "" },
    lastName: { type: String, trim: true, default: "" },
    passwordHash: { type: String, required: true },
    role: {
      type: String,
      required: true,
      enum: userRoles,
      default: "technician",
    },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true }
);

export const UserModel = mongoose.model<UserRecord>("User", userSchema);

export function toUser(doc: HydratedDocument<UserRecord>): User {
  return {
    id: doc._id.toString(),
    username: doc.username,
    email: doc.email,
    firstName: doc.firstName,
    lastName: doc.lastName,
    role: doc.role,
    isActive: doc.isActive,
    passwordHash: doc.passwordHash,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function publicUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    isActive: user.isActive,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
