import express from "express";

import type { AppContext } from "../context.js";
import { authOf, createRequireAuth, requireRole, type AuthRequest } from "../middleware/auth.js";
import { publicUser, userRoles, type UserData } from "../models/User.js";
import { createUser, hashPassword } from "../services/users.js";
import { ConflictError, NotFoundError } from "../utils/errors.js";
import { historyLimits, listPage } from "../utils/pagination.js";
import { asBody, asBoolean, asEnum, asString, check, idParam, queryString } from "../utils/validate.js";

export function createUsersRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));
  router.use(requireRole("admin"));

  router.get("/", async (req, res) => {
        const role = check(asEnum(queryString(req.query.role), userRoles, { field: "role" }));

    const result = await listPage(ctx.store.users, req.query, { role }, { username: 1 }, historyLimits);
    res.json({ ok: true, ...result, items: result.items.map(publicUser) });
  });

  router.post("/", async (req, res) => {
    const body = asBody(req.body);
    const password = check(asString(body.password, { field: "password", required: true, minLen: 8, maxLen: 200 }));

    const user = await createUser(ctx.store, {
      username: check(asString(body.username, { field: "username", required: true, trim: true, maxLen: 150 })),
      email: check(asString(body.email, { field: "email", required: true, trim: true, lower: true, maxLen: 254 })),
      password,
      role: check(asEnum(body.role, userRoles, { field: "role" })) ?? "technician",
      firstName: check(asString(body.firstName, { field: "firstName", trim: true, maxLen: 150 })),
      lastName: check(asString(body.lastName, { field: "lastName", trim: true, maxLen: 150 })),
      isActive: check(asBoolean(body.isActive, { field: "isActive" })),
    });
    res.status(201).json({ ok: true, user: publicUser(user) });
  });

  router.get("/:id", async (req, res) => {
    const user = await ctx.store.users.findById(idParam(req.params.id));
    if (!user) throw new NotFoundError("User not found");
    res.json({ ok: true, user: publicUser(user) });
  });

  router.patch("/:id", async (req, res) => {
    const id = idParam(req.params.id);
    const body = asBody(req.body);

    const patch: Partial<UserData> = {
      username: check(asString(body.username, { field: "username", trim: true, minLen: 1, maxLen: 150 })),
      email: check(asString(body.email, { field: "email", trim: true, lower: true, minLen: 3, maxLen: 254 })),
      firstName: check(asString(body.firstName, { field: "firstName", trim: true, maxLen: 150 })),
      lastName: check(asString(body.lastName, { field: "lastName", trim: true, maxLen: 150 })),
      role: check(asEnum(body.role, userRoles, { field: "role" })),
      isActive: check(asBoolean(body.isActive, { field: "isActive" })),
    };
    const password = check(asString(body.password, { field: "password", minLen: 8, maxLen: 200 }));
    if (password !== undefined) {
      patch.passwordHash = await hashPassword(password);
    }

    const user = await ctx.store.users.update(id, patch);
    if (!user) throw new NotFoundError("User not found");
    res.json({ ok: true, user: publicUser(user) });
  });

  router.delete("/:id", async (req: AuthRequest, res) => {
    const id = idParam(req.params.id);
    if (id === authOf(req).id) throw new ConflictError("You cannot delete your own account");

    await ctx.store.withTransaction(async (tx) => {
      const user = await tx.users.findById(id);
      if (!user) throw new NotFoundError("User not found");

      for (const entry of await tx.auditLogs.find({ systemUserId: id })) {
        await tx.auditLogs.update(entry.id, { systemUserId: null });
      }
      for (const warning of await tx.warnings.find({ resolvedById: id })) {
        await tx.warnings.update(warning.id, { resolvedById: null });
      }
      await tx.users.delete(id);
    });
    res.json({ ok: true });
  });

  return router;
}
