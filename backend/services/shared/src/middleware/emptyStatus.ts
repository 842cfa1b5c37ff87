// backend/services/shared/src/middleware/emptyStatus.ts

/**
 * Transport tails for services whose error contract is "status code, empty body".
 *
 * - notFoundEmpty(): unmatched routes → 404.
 * - errorEmpty(): anything thrown or passed to next(err) → its HTTP status.
 *   Errors exposing a numeric `status`/`statusCode` in 400..599 keep it
 *   (domain errors, body-parser's 400/413/415); everything else is a 500.
 */

import type { Request, Response, NextFunction } from "express";

export function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const raw =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : 500;
  const status = Number(raw);
  if (!Number.isInteger(status) || status < 400 || status > 599) return 500;
  return status;
}

export function notFoundEmpty() {
  return (_req: Request, res: Response) => {
    res.status(404).end();
  };
}

export function errorEmpty() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const bindings = { status, path: req.originalUrl, method: req.method, err };
    if (status >= 500) {
      req.log.error(bindings, "request failed");
    } else {
      req.log.warn(bindings, "request rejected");
    }

    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).end();
  };
}
