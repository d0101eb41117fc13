import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";

import type { AppContext } from "../context.js";
import type { UserRole } from "../models/User.js";

export type AuthUser = {
  id: string;
  username: string;
  role: UserRole;
};

export type AuthRequest = Request & { auth?: AuthUser };

function getJwtSecret(ctx: AppContext): string {
  const secret = ctx.config.jwtSecret;
  if (!secret) {
    throw new Error("JWT_SECRET is required");
  }
  return secret;
}

export function signAccessToken(ctx: AppContext, user: AuthUser): string {
  return jwt.sign({ id: user.id, role: user.role }, getJwtSecret(ctx), { expiresIn: "7d" });
}

function unauthorized(res: Response): void {
  res.status(401).json({ ok: false, error: "Unauthorized" });
}

/**
 * Verifies the bearer token, reloads the user so deactivated accounts are
 * rejected, and publishes the actor to the request context.
 */
export function createRequireAuth(ctx: AppContext) {
  return async function requireAuth(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    const header = req.header("authorization") ?? "";
    const match = header.match(/^Bearer\s+(.+)$/i);
    const token = match?.[1];

    if (!token) {
      unauthorized(res);
      return;
    }

    let id: unknown;
    try {
      const decoded = jwt.verify(token, getJwtSecret(ctx));
      if (typeof decoded !== "object" || decoded === null) {
        unauthorized(res);
        return;
      }
      id = decoded.id;
    } catch {
      unauthorized(res);
      return;
    }

    if (typeof id !== "string") {
      unauthorized(res);
      return;
    }

    const user = await ctx.store.users.findById(id);
    if (!user || !user.isActive) {
      unauthorized(res);
      return;
    }

    req.auth = { id: user.id, username: user.username, role: user.role };
    ctx.requestContext.set(req.auth);
    next();
  };
}

export function requireRole(...allowedRoles: UserRole[]) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    if (!req.auth) {
      unauthorized(res);
      return;
    }

    if (!allowedRoles.includes(req.auth.role)) {
      res.status(403).json({ ok: false, error: "Forbidden" });
      return;
    }

    next();
  };
}

/** The authenticated user; only valid behind `requireAuth`. */
export function authOf(req: AuthRequest): AuthUser {
  if (!req.auth) throw new Error("authOf used on a route without requireAuth");
  return req.auth;
}
