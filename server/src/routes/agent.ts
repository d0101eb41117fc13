import express from "express";

import { parseAgentReport } from "../agent/payload.js";
import type { AppContext } from "../context.js";
import { createRequireAgentKey } from "../middleware/gate.js";
import { ingestHardwareReport } from "../services/agentIngest.js";

export function createAgentRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAgentKey(ctx.config));

  router.post("/hardware-report", async (req, res) => {
    const report = parseAgentReport(req.body);
    const result = await ingestHardwareReport(ctx.store, report);
    res.status(result.assetCreated ? 201 : 200).json({ ok: true, ...result });
  });

  return router;
}
