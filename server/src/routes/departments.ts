import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import { NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import { asBody, asString, check, idParam } from "../utils/validate.js";

export function createDepartmentsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
    const result = await listPage(ctx.store.departments, req.query, {}, { name: 1 }, catalogLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const department = await ctx.store.departments.insert({
      name: check(asString(body.name, { field: "name", required: true, trim: true, maxLen: 100 })),
    });
    res.status(201).json({ ok: true, department });
  });

  router.get("/:id", async (req, res) => {
    const department = await ctx.store.departments.findById(idParam(req.params.id));
    if (!department) throw new NotFoundError("Department not found");
    res.json({ ok: true, department });
  });

  router.patch("/:id", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const department = await ctx.store.departments.update(idParam(req.params.id), {
      name: check(asString(body.name, { field: "name", trim: true, minLen: 1, maxLen: 100 })),
    });
    if (!department) throw new NotFoundError("Department not found");
    res.json({ ok: true, department });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const id = idParam(req.params.id);

    await ctx.store.withTransaction(async (tx) => {
      const department = await tx.departments.findById(id);
      if (!department) throw new NotFoundError("Department not found");

      for (const asset of await tx.assets.find({ departmentId: id })) {
        await tx.assets.update(asset.id, { departmentId: null });
      }
      for (const employee of await tx.employees.find({ departmentId: id })) {
        await tx.employees.update(employee.id, { departmentId: null });
      }
      await tx.departments.delete(id);
    });

    res.json({ ok: true });
  });

  return router;
}
