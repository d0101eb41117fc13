import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import type { EmployeeData } from "../models/Employee.js";
import type { Repositories } from "../store/types.js";
import { ConflictError, NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import { asBody, asObjectId, asString, check, idParam, queryString } from "../utils/validate.js";

async function assertDepartment(store: Repositories, departmentId: string | null | undefined): Promise<void> {
  if (!departmentId) return;
  if (!(await store.departments.findById(departmentId))) throw new NotFoundError("Department not found");
}

export function createEmployeesRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
        const departmentId = check(asObjectId(queryString(req.query.departmentId), { field: "departmentId" }));
    const rut = queryString(req.query.rut, 20);
    const result = await listPage(
      ctx.store.employees,
      req.query,
      { departmentId, rut },
      { lastName: 1, firstName: 1 },
      catalogLimits
    );
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const departmentId = check(asObjectId(body.departmentId, { field: "departmentId" })) ?? null;
    await assertDepartment(ctx.store, departmentId);

    const employee = await ctx.store.employees.insert({
      rut: check(asString(body.rut, { field: "rut", required: true, trim: true, maxLen: 12 })),
      firstName: check(asString(body.firstName, { field: "firstName", required: true, trim: true, maxLen: 100 })),
      lastName: check(asString(body.lastName, { field: "lastName", required: true, trim: true, maxLen: 100 })),
      email: check(asString(body.email, { field: "email", required: true, trim: true, lower: true, maxLen: 254 })),
      position: check(asString(body.position, { field: "position", trim: true, maxLen: 100 })) ?? "",
      departmentId,
    });
    res.status(201).json({ ok: true, employee });
  });

  router.get("/:id", async (req, res) => {
    const employee = await ctx.store.employees.findById(idParam(req.params.id));
    if (!employee) throw new NotFoundError("Employee not found");

    const assets = await ctx.store.assets.find({ employeeId: employee.id }, { sort: { inventoryCode: 1 } });
    res.json({ ok: true, employee, assets });
  });

  router.patch("/:id", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const patch: Partial<EmployeeData> = {
      rut: check(asString(body.rut, { field: "rut", trim: true, minLen: 1, maxLen: 12 })),
      firstName: check(asString(body.firstName, { field: "firstName", trim: true, minLen: 1, maxLen: 100 })),
      lastName: check(asString(body.lastName, { field: "lastName", trim: true, minLen: 1, maxLen: 100 })),
      email: check(asString(body.email, { field: "email", trim: true, lower: true, minLen: 3, maxLen: 254 })),
      position: check(asString(body.position, { field: "position", trim: true, maxLen: 100 })),
    };
    if (body.departmentId !== undefined) {
      patch.departmentId = check(asObjectId(body.departmentId, { field: "departmentId" })) ?? null;
      await assertDepartment(ctx.store, patch.departmentId);
    }

    const employee = await ctx.store.employees.update(idParam(req.params.id), patch);
    if (!employee) throw new NotFoundError("Employee not found");
    res.json({ ok: true, employee });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const id = idParam(req.params.id);

    await ctx.store.withTransaction(async (tx) => {
      const employee = await tx.employees.findById(id);
      if (!employee) throw new NotFoundError("Employee not found");
      if ((await tx.checkins.count({ employeeId: id })) > 0) {
        throw new ConflictError("Employee has asset check-ins and cannot be deleted");
      }

      for (const asset of await tx.assets.find({ employeeId: id })) {
        await tx.assets.update(asset.id, { employeeId: null, status: asset.status === "ASSIGNED" ? "IN_STORAGE" : asset.status });
      }
      await tx.employees.delete(id);
    });

    res.json({ ok: true });
  });

  return router;
}
