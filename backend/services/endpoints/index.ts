// backend/services/endpoints/index.ts

/**
 * Start-up order: load env (bootstrap) → config → connect the store →
 * build the app around the injected repo → start HTTP.
 */

import "./src/bootstrap"; // loads env + sets SERVICE_NAME

import { logger } from "@shared/src/utils/logger";
import { createRedis } from "@shared/src/utils/redis";
import { startHttpService } from "@shared/src/bootstrap/startHttpService";
import { loadConfig, SERVICE_NAME } from "./src/config";
import { buildApp } from "./src/app";
import { EndpointRepo } from "./src/repo/endpointRepo";
import { RedisHashStore } from "./src/repo/RedisHashStore";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const config = loadConfig();

  const client = createRedis(config.store, logger);
  await client.connect();

  const repo = new EndpointRepo(new RedisHashStore(client));

  startHttpService({
    app: buildApp({ repo }),
    host: config.addr,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: async () => {
      await client.quit();
    },
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
