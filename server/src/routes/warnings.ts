import express from "express";

import type { AppContext } from "../context.js";
import { authOf, createRequireAuth, requireRole, type AuthRequest } from "../middleware/auth.js";
import { warningSources, warningStatuses } from "../models/ComplianceWarning.js";
import { generateVulnerabilityWarnings } from "../services/vulnerabilities.js";
import { changeWarningStatus, createWarning } from "../services/warnings.js";
import { NotFoundError } from "../utils/errors.js";
import { historyLimits, listPage } from "../utils/pagination.js";
import {
  asBody,
  asEnum,
  asJsonObject,
  asObjectId,
  asString,
  check,
  idParam,
  queryString,
} from "../utils/validate.js";

export function createWarningsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
    const filter = {
      status: check(asEnum(queryString(req.query.status), warningStatuses, { field: "status" })),
      category: queryString(req.query.category, 100),
      assetId: check(asObjectId(queryString(req.query.assetId), { field: "assetId" })),
      source: check(asEnum(queryString(req.query.source), warningSources, { field: "source" })),
    };
    const result = await listPage(ctx.store.warnings, req.query, filter, { createdAt: -1 }, historyLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/scan", requireRole("admin"), async (req: AuthRequest, res) => {
    const result = await generateVulnerabilityWarnings(ctx.store, authOf(req).id);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("technician", "admin"), async (req, res) => {
    const body = asBody(req.body);
    const assetId = check(asObjectId(body.assetId, { field: "assetId", required: true }));
    if (!(await ctx.store.assets.findById(assetId))) throw new NotFoundError("Asset not found");

    const warning = await createWarning(ctx.store, {
      assetId,
      category: check(asString(body.category, { field: "category", required: true, trim: true, maxLen: 100 })),
      description: check(asString(body.description, { field: "description", required: true, trim: true, maxLen: 5000 })),
      evidence: check(asJsonObject(body.evidence, { field: "evidence" })) ?? null,
      source: "manual",
    });
    res.status(201).json({ ok: true, warning });
  });

  router.get("/:id", async (req, res) => {
    const warning = await ctx.store.warnings.findById(idParam(req.params.id));
    if (!warning) throw new NotFoundError("Warning not found");
    res.json({ ok: true, warning });
  });

  router.patch("/:id/status", requireRole("technician", "admin"), async (req: AuthRequest, res) => {
    const body = asBody(req.body);
    const status = check(asEnum(body.status, warningStatuses, { field: "status", required: true }));
    const notes = check(asString(body.resolutionNotes, { field: "resolutionNotes", trim: true, maxLen: 5000 }));

    const warning = await changeWarningStatus(ctx.store, idParam(req.params.id), status, authOf(req).id, notes);
    res.json({ ok: true, warning });
  });

  return router;
}
