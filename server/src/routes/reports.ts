import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth } from "../middleware/auth.js";
import { assetStatuses, assetTypes } from "../models/Asset.js";
import { warningSources, warningStatuses } from "../models/ComplianceWarning.js";
import { getObsoleteAssets } from "../services/obsolescence.js";
import {
  assetsBySpecs,
  assetsDistribution,
  employeesDistribution,
  employeesWithAssets,
  licenseUsageReport,
  licenseUsageStates,
  softwareAnalytics,
  softwareInstallations,
  summaryMetrics,
  warningsAnalytics,
  warningsReport,
} from "../services/reports.js";
import { getRules } from "../services/rules.js";
import { getVulnerableInstallations } from "../services/vulnerabilities.js";
import { asDateFromString, asEnum, asObjectId, check, queryFlag, queryNumber, queryString } from "../utils/validate.js";

function tally(values: string[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const v of values) out[v] = (out[v] ?? 0) + 1;
  return out;
}

/** A bare date as upper bound covers that whole day. */
function queryUntil(raw: unknown): Date | undefined {
  const v = queryString(raw);
  const to = check(asDateFromString(v, { field: "to" }));
  if (!to || !v || !/^\d{4}-\d{2}-\d{2}$/.test(v)) return to;
  return new Date(to.getTime() + 24 * 60 * 60 * 1000 - 1);
}

function queryId(raw: unknown, field: string): string | undefined {
  return check(asObjectId(queryString(raw), { field }));
}

export function createReportsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (_req, res) => {
    res.json({
      ok: true,
      endpoints: {
        summary: "GET /reports/summary",
        employeesAssets: "GET /reports/employees-assets",
        assetsSpecs: "GET /reports/assets-specs",
        softwareInstallations: "GET /reports/software-installations",
        licensesUsage: "GET /reports/licenses-usage",
        warnings: "GET /reports/warnings",
        obsoleteAssets: "GET /reports/obsolete-assets",
        vulnerableInstallations: "GET /reports/vulnerable-installations",
        analytics: "GET /reports/analytics/{assets,employees,warnings,software}",
      },
    });
  });

  router.get("/summary", async (_req, res) => {
    res.json({ ok: true, summary: await summaryMetrics(ctx.store) });
  });

  router.get("/employees-assets", async (req, res) => {
    const items = await employeesWithAssets(ctx.store, {
      departmentId: queryId(req.query.departmentId, "departmentId"),
      hasAssets: queryFlag(req.query.hasAssets, "hasAssets"),
    });
    res.json({ ok: true, total: items.length, items });
  });

  router.get("/assets-specs", async (req, res) => {
    const items = await assetsBySpecs(ctx.store, {
      assetType: check(asEnum(queryString(req.query.assetType), assetTypes, { field: "assetType" })),
      status: check(asEnum(queryString(req.query.status), assetStatuses, { field: "status" })),
      departmentId: queryId(req.query.departmentId, "departmentId"),
      hasEmployee: queryFlag(req.query.hasEmployee, "hasEmployee"),
      ramMin: queryNumber(req.query.ramMin, "ramMin"),
      ramMax: queryNumber(req.query.ramMax, "ramMax"),
    });
    res.json({ ok: true, total: items.length, items });
  });

  router.get("/software-installations", async (req, res) => {
    const items = await softwareInstallations(ctx.store, {
      softwareId: queryId(req.query.softwareId, "softwareId"),
      hasLicense: queryFlag(req.query.hasLicense, "hasLicense"),
      departmentId: queryId(req.query.departmentId, "departmentId"),
    });
    res.json({ ok: true, total: items.length, items });
  });

  router.get("/obsolete-assets", async (_req, res) => {
    const rules = await getRules(ctx.store, ctx.config.obsolescence);
    const items = await getObsoleteAssets(ctx.store, rules);
    res.json({ ok: true, rules, total: items.length, items });
  });

  router.get("/vulnerable-installations", async (_req, res) => {
    const items = await getVulnerableInstallations(ctx.store);
    res.json({ ok: true, total: items.length, items });
  });

  router.get("/licenses-usage", async (req, res) => {
    const items = await licenseUsageReport(ctx.store, {
      softwareId: queryId(req.query.softwareId, "softwareId"),
      state: check(asEnum(queryString(req.query.state), licenseUsageStates, { field: "state" })),
    });
    res.json({ ok: true, total: items.length, items });
  });

  router.get("/warnings", async (req, res) => {
    const items = await warningsReport(ctx.store, {
      status: check(asEnum(queryString(req.query.status), warningStatuses, { field: "status" })),
      category: queryString(req.query.category, 100),
      source: check(asEnum(queryString(req.query.source), warningSources, { field: "source" })),
      departmentId: queryId(req.query.departmentId, "departmentId"),
      from: check(asDateFromString(queryString(req.query.from), { field: "from" })),
      to: queryUntil(req.query.to),
    });
    res.json({
      ok: true,
      total: items.length,
      byStatus: tally(items.map((w) => w.status)),
      byCategory: tally(items.map((w) => w.category)),
      bySource: tally(items.map((w) => w.source)),
      items,
    });
  });

  router.get("/analytics/assets", async (_req, res) => {
    res.json({ ok: true, ...(await assetsDistribution(ctx.store)) });
  });

  router.get("/analytics/employees", async (_req, res) => {
    res.json({ ok: true, ...(await employeesDistribution(ctx.store)) });
  });

  router.get("/analytics/warnings", async (_req, res) => {
    res.json({ ok: true, ...(await warningsAnalytics(ctx.store)) });
  });

  router.get("/analytics/software", async (_req, res) => {
    res.json({ ok: true, ...(await softwareAnalytics(ctx.store)) });
  });

  return router;
}
