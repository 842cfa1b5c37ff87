// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Request telemetry via pino-http.
 *
 * - Reuses a caller-supplied correlation id (x-request-id, x-correlation-id,
 *   x-amzn-trace-id) or mints a UUID, and always echoes it as x-request-id.
 * - Severity by outcome: 5xx/error=error, 4xx=warn, everything else=info.
 * - Health probes and favicons are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger, type Logger } from "@shared/src/utils/logger";

const QUIET_PATHS = new Set([
  "/health/live",
  "/health/ready",
  "/favicon.ico",
]);

function firstHeader(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

/** Request lines inherit `service` from the root logger's base bindings. */
export function makeHttpLogger(logger: Logger = rootLogger) {
  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id =
        firstHeader(req.headers["x-request-id"]) ||
        firstHeader(req.headers["x-correlation-id"]) ||
        firstHeader(req.headers["x-amzn-trace-id"]) ||
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
