import type { NextFunction, Request, Response } from "express";

import type { AppConfig } from "../config.js";

/**
 * Agent endpoints are open unless AGENT_API_KEY is configured, in which case
 * every call must carry it in `x-agent-api-key`.
 */
export function createRequireAgentKey(config: AppConfig) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expected = config.agentApiKey;
    if (!expected) {
      next();
      return;
    }

    const provided = (req.header("x-agent-api-key") ?? "").trim();
    if (!provided || provided !== expected) {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    next();
  };
}
