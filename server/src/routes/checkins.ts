import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import { NotFoundError } from "../utils/errors.js";
import { historyLimits, listPage } from "../utils/pagination.js";
import { asBody, asNumber, asObjectId, asString, check, idParam, queryString } from "../utils/validate.js";

export function createCheckinsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
    const filter = {
      assetId: check(asObjectId(queryString(req.query.assetId), { field: "assetId" })),
      employeeId: check(asObjectId(queryString(req.query.employeeId), { field: "employeeId" })),
    };
    const result = await listPage(ctx.store.checkins, req.query, filter, { createdAt: -1 }, historyLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("technician", "admin"), async (req, res) => {
    const body = asBody(req.body);
    const assetId = check(asObjectId(body.assetId, { field: "assetId", required: true }));
    const employeeId = check(asObjectId(body.employeeId, { field: "employeeId", required: true }));
    if (!(await ctx.store.assets.findById(assetId))) throw new NotFoundError("Asset not found");
    if (!(await ctx.store.employees.findById(employeeId))) throw new NotFoundError("Employee not found");

    const checkin = await ctx.store.checkins.insert({
      assetId,
      employeeId,
      physicalState: check(asString(body.physicalState, { field: "physicalState", required: true, trim: true, maxLen: 100 })),
      performanceSatisfaction:
        check(asNumber(body.performanceSatisfaction, { field: "performanceSatisfaction", integer: true, min: 1, max: 5 })) ??
        null,
      notes: check(asString(body.notes, { field: "notes", trim: true, maxLen: 2000 })) ?? "",
    });
    res.status(201).json({ ok: true, checkin });
  });

  router.get("/:id", async (req, res) => {
    const checkin = await ctx.store.checkins.findById(idParam(req.params.id));
    if (!checkin) throw new NotFoundError("Check-in not found");
    res.json({ ok: true, checkin });
  });

  return router;
}
