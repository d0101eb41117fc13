import { describe, expect, it } from "vitest";

import { AuditLogModel } from "../models/AuditLog.js";
import { ComplianceWarningModel } from "../models/ComplianceWarning.js";

describe("free-form JSON fields", () => {
  it.each([
    ["compliance warnings", ComplianceWarningModel.schema],
    ["audit logs", AuditLogModel.schema],
  ])("keep empty objects in %s", (_name, schema) => {
    expect(schema.get("minimize")).toBe(false);
  });
});
