// backend/services/shared/src/app/createServiceApp.ts

/**
 * Shared Express builder for internal services.
 *
 * Stack order: http logger → health (open) → routes → 404 → error tail.
 *
 * Notes:
 * - No global body parsers; each route mounts the parser its contract needs.
 * - Error responses carry a status code and an empty body.
 */

import express, { type Express, type Router } from "express";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFoundEmpty, errorEmpty } from "../middleware/emptyStatus";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "endpoints"). Used in health payloads. */
  serviceName: string;
  /** Base path the service router is mounted on. Defaults to "/". */
  apiPrefix?: string;
  /** Builds the service router; routes stay one-liners that bind handlers. */
  mountRoutes: () => Router;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix = "/", mountRoutes, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  app.use(makeHttpLogger());

  app.use(createHealthRouter({ service: serviceName, readiness }));

  app.use(apiPrefix, mountRoutes());

  app.use(notFoundEmpty());
  app.use(errorEmpty());

  return app;
}
