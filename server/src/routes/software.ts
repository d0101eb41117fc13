import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import { ConflictError, NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import { asBody, asString, check, idParam, queryString } from "../utils/validate.js";

export function createSoftwareRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
        const developer = queryString(req.query.developer, 200);
    const result = await listPage(ctx.store.software, req.query, { developer }, { name: 1 }, catalogLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const software = await ctx.store.software.insert({
      name: check(asString(body.name, { field: "name", required: true, trim: true, maxLen: 255 })),
      developer: check(asString(body.developer, { field: "developer", trim: true, maxLen: 255 })) ?? "",
    });
    res.status(201).json({ ok: true, software });
  });

  router.get("/:id", async (req, res) => {
    const software = await ctx.store.software.findById(idParam(req.params.id));
    if (!software) throw new NotFoundError("Software not found");

    const [installations, vulnerabilities] = await Promise.all([
      ctx.store.installations.count({ softwareId: software.id }),
      ctx.store.vulnerabilities.find({ softwareId: software.id }, { sort: { cveId: 1 } }),
    ]);
    res.json({ ok: true, software, installations, vulnerabilities });
  });

  router.patch("/:id", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const software = await ctx.store.software.update(idParam(req.params.id), {
      name: check(asString(body.name, { field: "name", trim: true, minLen: 1, maxLen: 255 })),
      developer: check(asString(body.developer, { field: "developer", trim: true, maxLen: 255 })),
    });
    if (!software) throw new NotFoundError("Software not found");
    res.json({ ok: true, software });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const id = idParam(req.params.id);

    await ctx.store.withTransaction(async (tx) => {
      const software = await tx.software.findById(id);
      if (!software) throw new NotFoundError("Software not found");
      if ((await tx.installations.count({ softwareId: id })) > 0) {
        throw new ConflictError("Software is installed on at least one asset");
      }

      await tx.licenses.deleteMany({ softwareId: id });
      await tx.vulnerabilities.deleteMany({ softwareId: id });
      await tx.software.delete(id);
    });

    res.json({ ok: true });
  });

  return router;
}
