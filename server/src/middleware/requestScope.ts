import type { NextFunction, Request, Response } from "express";

import type { RequestContext } from "../audit/requestContext.js";

/**
 * Opens a request-context scope for everything downstream. The scope is
 * cleared when the response finishes or the connection drops, whichever
 * happens first.
 */
export function createRequestScope(context: RequestContext) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    context.run((end) => {
      res.once("finish", end);
      res.once("close", end);
      next();
    });
  };
}
