// backend/services/shared/src/utils/redis.ts

/**
 * Redis/Valkey client factory (node-redis v4).
 *
 * - Fails connect() when the store can't be reached the first time; after the
 *   first ready it reconnects with a short backoff capped at 1s.
 * - Offline queue is disabled: commands issued while disconnected reject
 *   immediately instead of waiting for the socket to come back.
 * - Connection errors are logged, debounced so an outage doesn't flood stdout.
 */

import { createClient } from "redis";
import type { Logger } from "./logger";

export type RedisClient = ReturnType<typeof createClient>;

export type RedisTarget = {
  /** Connection URL without the database path, e.g. redis://cache:6379 */
  url: string;
  /** Logical database index. */
  database: number;
};

const ERR_DEBOUNCE_MS = 5000;

function formatRedisError(err: unknown): string {
  if (err instanceof AggregateError && err.errors.length) {
    const parts = err.errors.map((x: unknown) =>
      x instanceof Error ? x.message : String(x)
    );
    return `AggregateError: ${parts.join(" | ")}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Backoff capped at 1s once the client has been ready. Before that the
 * connection cause is returned, which stops retrying and rejects connect().
 */
export function reconnectStrategy(hasBeenReady: () => boolean) {
  return (retries: number, cause: Error): number | Error =>
    hasBeenReady() ? Math.min(1000, Math.max(50, retries * 100)) : cause;
}

export function createRedis(target: RedisTarget, logger: Logger): RedisClient {
  let ready = false;
  const client = createClient({
    url: target.url,
    database: target.database,
    disableOfflineQueue: true,
    socket: {
      reconnectStrategy: reconnectStrategy(() => ready),
      keepAlive: 5000,
      noDelay: true,
    },
  });

  let lastErrAt = 0;

  client.on("ready", () => {
    ready = true;
    logger.info({ database: target.database }, "[redis] ready");
  });

  client.on("error", (err: unknown) => {
    const now = Date.now();
    if (now - lastErrAt >= ERR_DEBOUNCE_MS) {
      lastErrAt = now;
      logger.error({ err: formatRedisError(err) }, "[redis] error");
    }
  });

  return client;
}
