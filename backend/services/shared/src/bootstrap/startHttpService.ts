// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Bind an Express app, harden socket timeouts, log where it landed and shut
 * down cleanly on SIGINT/SIGTERM.
 *
 * Notes:
 * - Uses `process.once` so repeated calls don't multiply signal handlers.
 * - `onShutdown` runs after the server stops accepting connections (close
 *   store clients there).
 * - Exposes `stop()` for harnesses and orderly shutdowns.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "../utils/logger";

export interface StartHttpServiceOptions {
  app: Express;
  /** Interface to bind, e.g. "0.0.0.0". */
  host: string;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  serviceName: string;
  logger: Logger;
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, host, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, host, () => {
    const addr = server.address();
    const boundPort = isAddressInfo(addr) ? addr.port : port;
    logger.info({ service: serviceName, host, port: boundPort }, "service listening");
  });

  // headersTimeout must stay above keepAliveTimeout
  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop()
      .then(() => onShutdown?.())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      });
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}

function isAddressInfo(addr: string | AddressInfo | null): addr is AddressInfo {
  return typeof addr === "object" && addr !== null;
}
