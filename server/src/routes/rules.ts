import express from "express";

import type { AppContext } from "../context.js";
import { authOf, createRequireAuth, requireRole, type AuthRequest } from "../middleware/auth.js";
import { getRules, updateRules, type RulesPatch } from "../services/rules.js";
import { ValidationError } from "../utils/errors.js";
import { asBody, asBoolean, asNumber, asString, check } from "../utils/validate.js";

export function createRulesRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (_req, res) => {
    const rules = await getRules(ctx.store, ctx.config.obsolescence);
    res.json({ ok: true, rules });
  });

  router.put("/", requireRole("admin"), async (req: AuthRequest, res) => {
    const body = asBody(req.body);
    const patch: RulesPatch = {};

    const windowsMinVersion = check(asString(body.windowsMinVersion, { field: "windowsMinVersion", trim: true, maxLen: 50 }));
    if (windowsMinVersion !== undefined) {
      if (!/^\d+(\.\d+){0,2}$/.test(windowsMinVersion)) {
        throw new ValidationError("Invalid rules", { windowsMinVersion: "expected a build such as 10.0.19045" });
      }
      patch.windowsMinVersion = windowsMinVersion;
    }

    const ramMinGb = check(asNumber(body.ramMinGb, { field: "ramMinGb", integer: true, min: 0 }));
    if (ramMinGb !== undefined) patch.ramMinGb = ramMinGb;

    const diskMinFreePercent = check(asNumber(body.diskMinFreePercent, { field: "diskMinFreePercent", min: 0, max: 100 }));
    if (diskMinFreePercent !== undefined) patch.diskMinFreePercent = diskMinFreePercent;

    const enabled = check(asBoolean(body.enabled, { field: "enabled" }));
    if (enabled !== undefined) patch.enabled = enabled;

    const rules = await updateRules(ctx.store, ctx.config.obsolescence, patch, authOf(req).id);
    res.json({ ok: true, rules });
  });

  return router;
}
