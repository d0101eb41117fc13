import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import { auditActions } from "../models/AuditLog.js";
import { NotFoundError } from "../utils/errors.js";
import { historyLimits, listPage } from "../utils/pagination.js";
import { asEnum, asObjectId, check, idParam, queryString } from "../utils/validate.js";

export function createAuditLogsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));
  router.use(requireRole("admin"));

  router.get("/", async (req, res) => {
    const filter = {
      action: check(asEnum(queryString(req.query.action), auditActions, { field: "action" })),
      targetTable: queryString(req.query.targetTable, 64),
      targetId: check(asObjectId(queryString(req.query.targetId), { field: "targetId" })),
      systemUserId: check(asObjectId(queryString(req.query.systemUserId), { field: "systemUserId" })),
    };
    const result = await listPage(ctx.store.auditLogs, req.query, filter, { createdAt: -1 }, historyLimits);
    res.json({ ok: true, ...result });
  });

  router.get("/:id", async (req, res) => {
    const entry = await ctx.store.auditLogs.findById(idParam(req.params.id));
    if (!entry) throw new NotFoundError("Audit log not found");
    res.json({ ok: true, entry });
  });

  return router;
}
