import mongoose, { type HydratedDocument, type Types } from "mongoose";

import type { Stored } from "../store/types.js";
import type { JsonObject } from "../utils/json.js";
import { refId } from "./common.js";

export const auditActions = ["CREATE", "UPDATE", "DELETE"] as const;
export type AuditAction = (typeof auditActions)[number];

export type AuditLogData = {
  /** Null once the acting user is gone; `actorName` keeps who it was. */
  systemUserId: string | null;
  actorName: string;
  action: AuditAction;
  targetTable: string;
  targetId: string;
  details: JsonObject;
};
/** `createdAt` is the audit timestamp. */
export type AuditLog = Stored<AuditLogData>;

type AuditLogRecord = Omit<AuditLogData, "systemUserId"> & {
  systemUserId: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
};

const auditLogSchema = new mongoose.Schema<AuditLogRecord>(
  {
    systemUserId: { type: mongoose.Schema.Types.ObjectId, ref: "User", default: null, index: true },
    actorName: { type: String, required: true, trim: true },
    action: { type: String, required: true, enum: auditActions, index: true },
    targetTable: { type: String, required: true, trim: true },
    targetId: { type: String, required: true, trim: true },
    details: { type: mongoose.Schema.Types.Mixed, default: {} },
  },
  { timestamps: true, minimize: false }
);

auditLogSchema.index({ targetTable: 1, targetId: 1, createdAt: -1 });
auditLogSchema.index({ createdAt: -1 });

export const AuditLogModel = mongoose.model<AuditLogRecord>("AuditLog", auditLogSchema);

export function toAuditLog(doc: HydratedDocument<AuditLogRecord>): AuditLog {
  return {
    id: doc._id.toString(),
    systemUserId: refId(doc.systemUserId),
    actorName: doc.actorName,
    action: doc.action,
    targetTable: doc.targetTable,
    targetId: doc.targetId,
    details: doc.details ?? {},
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}
