import crypto from "crypto";

import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import mongoose from "mongoose";

import type { AppContext } from "./context.js";
import { createRequestScope } from "./middleware/requestScope.js";
import { createAgentRouter } from "./routes/agent.js";
import { createAssetsRouter } from "./routes/assets.js";
import { createAuditLogsRouter } from "./routes/auditLogs.js";
import { createAuthRouter } from "./routes/auth.js";
import { createCheckinsRouter } from "./routes/checkins.js";
import { createDepartmentsRouter } from "./routes/departments.js";
import { createEmployeesRouter } from "./routes/employees.js";
import { createInstallationsRouter } from "./routes/installations.js";
import { createLicensesRouter } from "./routes/licenses.js";
import { createReportsRouter } from "./routes/reports.js";
import { createRulesRouter } from "./routes/rules.js";
import { createSoftwareRouter } from "./routes/software.js";
import { createUsersRouter } from "./routes/users.js";
import { createVulnerabilitiesRouter } from "./routes/vulnerabilities.js";
import { createWarningsRouter } from "./routes/warnings.js";
import { AppError, DuplicateKeyError } from "./utils/errors.js";
import { errorFields, log } from "./utils/log.js";

type ReqWithId = Request & { requestId?: string };

type RateBucket = { count: number; resetAtMs: number };

function rateLimit(opts: { windowMs: number; max: number; keyPrefix: string }) {
  const buckets = new Map<string, RateBucket>();

  return (req: Request, res: Response, next: NextFunction) => {
    const now = Date.now();
    const key = `${opts.keyPrefix}:${req.ip || "unknown"}`;
    const existing = buckets.get(key);
    const bucket: RateBucket =
      existing && existing.resetAtMs > now ? existing : { count: 0, resetAtMs: now + opts.windowMs };

    bucket.count += 1;
    buckets.set(key, bucket);

    res.setHeader("x-ratelimit-limit", String(opts.max));
    res.setHeader("x-ratelimit-remaining", String(Math.max(0, opts.max - bucket.count)));
    res.setHeader("x-ratelimit-reset", String(Math.floor(bucket.resetAtMs / 1000)));

    if (bucket.count > opts.max) {
      res.status(429).json({ ok: false, error: "Too many requests" });
      return;
    }

    next();
  };
}

/** Status carried by errors thrown from body parsing (malformed JSON, payload too large). */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function createApp(ctx: AppContext) {
  const app = express();
  const { config } = ctx;

  if (config.trustProxy) {
    app.set("trust proxy", true);
  }

  app.use((req: ReqWithId, res, next) => {
    const header = req.header("x-request-id") ?? "";
    const requestId = header.trim() || crypto.randomUUID();
    req.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });

  app.use((req: ReqWithId, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      log.info("http request", {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        ms: Date.now() - startedAt,
        ip: req.ip,
        hasAuth: /^Bearer\s+/i.test(req.header("authorization") ?? ""),
      });
    });
    next();
  });

  app.use((_req, res, next) => {
    res.setHeader("x-content-type-options", "nosniff");
    res.setHeader("x-frame-options", "DENY");
    res.setHeader("referrer-policy", "no-referrer");
    res.setHeader("cross-origin-opener-policy", "same-origin");
    res.setHeader("cross-origin-resource-policy", "same-origin");
    if (config.isProd) {
      res.setHeader("content-security-policy", "default-src 'none'; frame-ancestors 'none'");
    }
    next();
  });

  app.use(express.json({ limit: "5mb" }));

  app.use(
    cors({
      origin: config.corsOrigins.length ? config.corsOrigins : config.isProd ? false : true,
      credentials: config.corsOrigins.length > 0,
    })
  );

  app.use("/auth", rateLimit({ windowMs: 60_000, max: 30, keyPrefix: "auth" }));

  // must follow body parsing, which loses the async scope
  app.use(createRequestScope(ctx.requestContext));

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      dataStore: config.dataStore,
      dbConnected: config.dataStore === "memory" || mongoose.connection.readyState === 1,
    });
  });

  app.use("/auth", createAuthRouter(ctx));
  app.use("/agent", createAgentRouter(ctx));
  app.use("/users", createUsersRouter(ctx));
  app.use("/departments", createDepartmentsRouter(ctx));
  app.use("/employees", createEmployeesRouter(ctx));
  app.use("/assets", createAssetsRouter(ctx));
  app.use("/software", createSoftwareRouter(ctx));
  app.use("/licenses", createLicensesRouter(ctx));
  app.use("/installations", createInstallationsRouter(ctx));
  app.use("/vulnerabilities", createVulnerabilitiesRouter(ctx));
  app.use("/checkins", createCheckinsRouter(ctx));
  app.use("/warnings", createWarningsRouter(ctx));
  app.use("/audit-logs", createAuditLogsRouter(ctx));
  app.use("/obsolescence-rules", createRulesRouter(ctx));
  app.use("/reports", createReportsRouter(ctx));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use((err: unknown, req: ReqWithId, res: Response, _next: NextFunction) => {
    const requestId = req.requestId;

    if (err instanceof AppError) {
      if (err.status >= 500) {
        log.error("request failed", { requestId, ...errorFields(err) });
      }
      res.status(err.status).json({ ok: false, error: err.message, details: err.details, requestId });
      return;
    }

    if (err instanceof DuplicateKeyError) {
      res.status(409).json({
        ok: false,
        error: "Duplicate value",
        details: Object.fromEntries(err.fields.map((f) => [f, "already in use"])),
        requestId,
      });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      res.status(clientStatus).json({ ok: false, error: "Invalid request body", requestId });
      return;
    }

    log.error("unhandled error", { requestId, ...errorFields(err) });
    res.status(500).json({ ok: false, error: "Internal server error", requestId });
  });

  return app;
}
