// backend/services/endpoints/src/config.ts

/**
 * Service config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - VALKEY_URL is required; listen address and port have defaults.
 * - LOG_LEVEL is read by the shared logger itself.
 * - Fail fast: loadConfig() throws on anything missing or invalid.
 */

import {
  optionalEnv,
  optionalNumber,
  requireEnv,
  type Env,
} from "@shared/src/env";
import type { RedisTarget } from "@shared/src/utils/redis";

export const SERVICE_NAME = "endpoints" as const;

const STORE_SCHEMES: ReadonlyMap<string, string> = new Map([
  ["redis:", "redis:"],
  ["rediss:", "rediss:"],
  ["valkey:", "redis:"],
  ["valkeys:", "rediss:"],
]);

export type EndpointsConfig = {
  addr: string;
  port: number;
  store: RedisTarget;
};

/**
 * Split a store URL such as `redis://cache:6379/2` into a connection URL
 * and the logical database index taken from the path segment.
 */
export function parseStoreUrl(raw: string): RedisTarget {
  let u: URL;
  try {
    u = new URL(raw);
  } catch {
    throw new Error(`parse VALKEY_URL: invalid URL "${raw}"`);
  }

  const scheme = STORE_SCHEMES.get(u.protocol);
  if (!scheme) {
    throw new Error(`parse VALKEY_URL: unsupported scheme "${u.protocol}"`);
  }
  if (!u.host) {
    throw new Error(`parse VALKEY_URL: missing host in "${raw}"`);
  }

  const dbStr = u.pathname.replace(/^\//, "");
  if (!/^\d+$/.test(dbStr)) {
    throw new Error(`parse DB from VALKEY_URL: "${dbStr}" is not a database index`);
  }

  const auth = u.username
    ? `${u.username}${u.password ? `:${u.password}` : ""}@`
    : u.password
      ? `:${u.password}@`
      : "";

  return { url: `${scheme}//${auth}${u.host}`, database: Number(dbStr) };
}

export function loadConfig(env: Env = process.env): EndpointsConfig {
  const port = optionalNumber(env, "ENDPOINTS_PORT", 8000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port for env var ENDPOINTS_PORT: "${port}"`);
  }

  return {
    addr: optionalEnv(env, "ENDPOINTS_ADDR", "0.0.0.0"),
    port,
    store: parseStoreUrl(requireEnv(env, "VALKEY_URL")),
  };
}
