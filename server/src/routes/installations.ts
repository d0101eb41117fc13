import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import type { InstalledSoftwareData } from "../models/InstalledSoftware.js";
import { assignLicense } from "../services/licenses.js";
import { NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import {
  asBody,
  asDateFromString,
  asObjectId,
  asString,
  check,
  idParam,
  queryString,
} from "../utils/validate.js";

export function createInstallationsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
    const filter = {
      assetId: check(asObjectId(queryString(req.query.assetId), { field: "assetId" })),
      softwareId: check(asObjectId(queryString(req.query.softwareId), { field: "softwareId" })),
      licenseId: check(asObjectId(queryString(req.query.licenseId), { field: "licenseId" })),
    };
    const result = await listPage(ctx.store.installations, req.query, filter, { createdAt: -1 }, catalogLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const assetId = check(asObjectId(body.assetId, { field: "assetId", required: true }));
    const softwareId = check(asObjectId(body.softwareId, { field: "softwareId", required: true }));
    if (!(await ctx.store.assets.findById(assetId))) throw new NotFoundError("Asset not found");
    if (!(await ctx.store.software.findById(softwareId))) throw new NotFoundError("Software not found");

    const created = await ctx.store.installations.insert({
      assetId,
      softwareId,
      version: check(asString(body.version, { field: "version", trim: true, maxLen: 100 })) ?? "",
      installDate: check(asDateFromString(body.installDate, { field: "installDate" })) ?? null,
      licenseId: null,
    });

    const licenseId = check(asObjectId(body.licenseId, { field: "licenseId" }));
    const installation = licenseId ? await assignLicense(ctx.store, created.id, licenseId) : created;
    res.status(201).json({ ok: true, installation });
  });

  router.get("/:id", async (req, res) => {
    const installation = await ctx.store.installations.findById(idParam(req.params.id));
    if (!installation) throw new NotFoundError("Installation not found");
    res.json({ ok: true, installation });
  });

  router.patch("/:id", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const patch: Partial<InstalledSoftwareData> = {
      version: check(asString(body.version, { field: "version", trim: true, maxLen: 100 })),
    };
    if (body.installDate !== undefined) {
      patch.installDate = check(asDateFromString(body.installDate, { field: "installDate" })) ?? null;
    }

    const installation = await ctx.store.installations.update(idParam(req.params.id), patch);
    if (!installation) throw new NotFoundError("Installation not found");
    res.json({ ok: true, installation });
  });

  router.post("/:id/license", requireRole("technician", "admin"), async (req, res) => {
    const body = asBody(req.body);
    const licenseId = check(asObjectId(body.licenseId, { field: "licenseId" })) ?? null;
    const installation = await assignLicense(ctx.store, idParam(req.params.id), licenseId);
    res.json({ ok: true, installation });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const installation = await ctx.store.installations.delete(idParam(req.params.id));
    if (!installation) throw new NotFoundError("Installation not found");
    res.json({ ok: true });
  });

  return router;
}
