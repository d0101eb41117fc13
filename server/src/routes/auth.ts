import bcrypt from "bcryptjs";
import express from "express";

import type { AppContext } from "../context.js";
import { authOf, createRequireAuth, signAccessToken, type AuthRequest } from "../middleware/auth.js";
import { publicUser } from "../models/User.js";
import { log } from "../utils/log.js";
import { asBody, asString, check } from "../utils/validate.js";

export function createAuthRouter(ctx: AppContext) {
  const router = express.Router();
  const requireAuth = createRequireAuth(ctx);

  router.get("/", async (_req, res) => {
    res.json({
      ok: true,
      endpoints: {
        login: "POST /auth/login",
        me: "GET /auth/me (Bearer token)",
      },
    });
  });

  router.post("/login", async (req, res) => {
    const body = asBody(req.body);
    const username = check(asString(body.username, { field: "username", required: true, trim: true, maxLen: 150 }));
    const password = check(asString(body.password, { field: "password", required: true, maxLen: 200 }));

    const user =
      (await ctx.store.users.findOne({ username })) ??
      (await ctx.store.users.findOne({ email: username.toLowerCase() }));
    if (!user || !user.isActive) {
      res.status(401).json({ ok: false, error: "Invalid credentials" });
      return;
    }

    const ok = await bcrypt.compare(password, user.passwordHash);
    if (!ok) {
      log.warn("login failed", { userId: user.id });
      res.status(401).json({ ok: false, error: "Invalid credentials" });
      return;
    }

    const token = signAccessToken(ctx, { id: user.id, username: user.username, role: user.role });
    res.json({ ok: true, token, user: publicUser(user) });
  });

  router.get("/me", requireAuth, async (req: AuthRequest, res) => {
    const user = await ctx.store.users.findById(authOf(req).id);
    if (!user) {
      res.status(404).json({ ok: false, error: "User not found" });
      return;
    }

    res.json({ ok: true, user: publicUser(user) });
  });

  return router;
}
