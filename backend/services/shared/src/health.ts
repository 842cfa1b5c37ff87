// backend/services/shared/src/health.ts

/**
 * Liveness and readiness for internal services.
 *
 * Exposes:
 *   GET /health/live   -> process is up, no dependency calls
 *   GET /health/ready  -> runs the optional readiness hook; 503 when it throws
 */

import express from "express";

export type ReadinessDetails = Record<string, string>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  /** Optional, fast readiness checker. */
  readiness?: ReadinessFn;
};

function getReqId(req: express.Request): string | undefined {
  const h = req.headers["x-request-id"];
  return (Array.isArray(h) ? h[0] : h) || undefined;
}

export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, requestId: getReqId(req) });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, requestId: getReqId(req), ...details });
    } catch (err) {
      req.log.warn({ err }, "readiness check failed");
      res.status(503).json({
        ...base,
        ok: false,
        requestId: getReqId(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);

  return router;
}
