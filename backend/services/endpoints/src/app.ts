// backend/services/endpoints/src/app.ts

/**
 * Endpoint registry app. The repo is injected so the same assembly runs
 * against Redis in production and an in-memory store in tests.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/src/app/createServiceApp";
import { endpointRoutes } from "./routes/endpointRoutes";
import type { EndpointRepo } from "./repo/endpointRepo";
import { SERVICE_NAME } from "./config";

export type AppDeps = {
  repo: EndpointRepo;
};

export function buildApp({ repo }: AppDeps): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    mountRoutes: () => endpointRoutes(repo),
    readiness: async () => {
      await repo.ping();
      return { store: "ok" };
    },
  });
}
