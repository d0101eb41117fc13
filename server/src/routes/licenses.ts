import express from "express";

import type { AppContext } from "../context.js";
import { authOf, createRequireAuth, requireRole, type AuthRequest } from "../middleware/auth.js";
import { maskLicenseKey, type License, type LicenseData } from "../models/License.js";
import { NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import { asBody, asDateFromString, asNumber, asObjectId, asString, check, idParam, queryString } from "../utils/validate.js";

/** Only admins read raw license keys. */
function present(license: License, req: AuthRequest): License {
  if (authOf(req).role === "admin") return license;
  return { ...license, licenseKey: maskLicenseKey(license.licenseKey) };
}

function optionalDate(raw: unknown, field: string): Date | null | undefined {
  if (raw === undefined) return undefined;
  return check(asDateFromString(raw, { field })) ?? null;
}

export function createLicensesRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req: AuthRequest, res) => {
        const softwareId = check(asObjectId(queryString(req.query.softwareId), { field: "softwareId" }));

    const result = await listPage(ctx.store.licenses, req.query, { softwareId }, { expirationDate: 1 }, catalogLimits);
    res.json({ ok: true, ...result, items: result.items.map((l) => present(l, req)) });
  });

  router.post("/", requireRole("admin"), async (req: AuthRequest, res) => {
    const body = asBody(req.body);
    const softwareId = check(asObjectId(body.softwareId, { field: "softwareId", required: true }));
    if (!(await ctx.store.software.findById(softwareId))) throw new NotFoundError("Software not found");

    const license = await ctx.store.licenses.insert({
      softwareId,
      licenseKey: check(asString(body.licenseKey, { field: "licenseKey", trim: true, maxLen: 500 })) ?? "",
      purchaseDate: optionalDate(body.purchaseDate, "purchaseDate") ?? null,
      expirationDate: optionalDate(body.expirationDate, "expirationDate") ?? null,
      quantity: check(asNumber(body.quantity, { field: "quantity", integer: true, min: 1 })) ?? 1,
    });
    res.status(201).json({ ok: true, license: present(license, req) });
  });

  router.get("/:id", async (req: AuthRequest, res) => {
    const license = await ctx.store.licenses.findById(idParam(req.params.id));
    if (!license) throw new NotFoundError("License not found");

    const used = await ctx.store.installations.count({ licenseId: license.id });
    res.json({ ok: true, license: present(license, req), used });
  });

  router.patch("/:id", requireRole("admin"), async (req: AuthRequest, res) => {
    const body = asBody(req.body);
    const patch: Partial<LicenseData> = {
      licenseKey: check(asString(body.licenseKey, { field: "licenseKey", trim: true, maxLen: 500 })),
      purchaseDate: optionalDate(body.purchaseDate, "purchaseDate"),
      expirationDate: optionalDate(body.expirationDate, "expirationDate"),
      quantity: check(asNumber(body.quantity, { field: "quantity", integer: true, min: 1 })),
    };

    const license = await ctx.store.licenses.update(idParam(req.params.id), patch);
    if (!license) throw new NotFoundError("License not found");
    res.json({ ok: true, license: present(license, req) });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const id = idParam(req.params.id);

    await ctx.store.withTransaction(async (tx) => {
      const license = await tx.licenses.findById(id);
      if (!license) throw new NotFoundError("License not found");

      for (const installation of await tx.installations.find({ licenseId: id })) {
        await tx.installations.update(installation.id, { licenseId: null });
      }
      await tx.licenses.delete(id);
    });

    res.json({ ok: true });
  });

  return router;
}
