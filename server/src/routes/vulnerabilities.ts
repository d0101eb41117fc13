import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import { vulnerabilitySeverities, type SoftwareVulnerabilityData } from "../models/SoftwareVulnerability.js";
import { NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import {
  asBody,
  asDateFromString,
  asEnum,
  asObjectId,
  asString,
  check,
  idParam,
  queryString,
} from "../utils/validate.js";

function text(body: Record<string, unknown>, field: string, maxLen: number): string | undefined {
  return check(asString(body[field], { field, trim: true, maxLen }));
}

export function createVulnerabilitiesRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
    const filter = {
      softwareId: check(asObjectId(queryString(req.query.softwareId), { field: "softwareId" })),
      severity: check(asEnum(queryString(req.query.severity), vulnerabilitySeverities, { field: "severity" })),
    };
    const result = await listPage(ctx.store.vulnerabilities, req.query, filter, { discoveredDate: -1 }, catalogLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const softwareId = check(asObjectId(body.softwareId, { field: "softwareId", required: true }));
    if (!(await ctx.store.software.findById(softwareId))) throw new NotFoundError("Software not found");

    const vulnerability = await ctx.store.vulnerabilities.insert({
      softwareId,
      cveId: text(body, "cveId", 50) ?? "",
      title: check(asString(body.title, { field: "title", required: true, trim: true, maxLen: 255 })),
      description: text(body, "description", 5000) ?? "",
      severity: check(asEnum(body.severity, vulnerabilitySeverities, { field: "severity", required: true })),
      affectedVersions: text(body, "affectedVersions", 255) ?? "",
      safeVersionFrom: check(asString(body.safeVersionFrom, { field: "safeVersionFrom", required: true, trim: true, maxLen: 100 })),
      linkToDetails: text(body, "linkToDetails", 500) ?? "",
      discoveredDate: check(asDateFromString(body.discoveredDate, { field: "discoveredDate" })) ?? null,
    });
    res.status(201).json({ ok: true, vulnerability });
  });

  router.get("/:id", async (req, res) => {
    const vulnerability = await ctx.store.vulnerabilities.findById(idParam(req.params.id));
    if (!vulnerability) throw new NotFoundError("Vulnerability not found");
    res.json({ ok: true, vulnerability });
  });

  router.patch("/:id", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const patch: Partial<SoftwareVulnerabilityData> = {
      cveId: text(body, "cveId", 50),
      title: check(asString(body.title, { field: "title", trim: true, minLen: 1, maxLen: 255 })),
      description: text(body, "description", 5000),
      severity: check(asEnum(body.severity, vulnerabilitySeverities, { field: "severity" })),
      affectedVersions: text(body, "affectedVersions", 255),
      safeVersionFrom: check(asString(body.safeVersionFrom, { field: "safeVersionFrom", trim: true, minLen: 1, maxLen: 100 })),
      linkToDetails: text(body, "linkToDetails", 500),
    };
    if (body.discoveredDate !== undefined) {
      patch.discoveredDate = check(asDateFromString(body.discoveredDate, { field: "discoveredDate" })) ?? null;
    }

    const vulnerability = await ctx.store.vulnerabilities.update(idParam(req.params.id), patch);
    if (!vulnerability) throw new NotFoundError("Vulnerability not found");
    res.json({ ok: true, vulnerability });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const vulnerability = await ctx.store.vulnerabilities.delete(idParam(req.params.id));
    if (!vulnerability) throw new NotFoundError("Vulnerability not found");
    res.json({ ok: true });
  });

  return router;
}
