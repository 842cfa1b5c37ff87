// backend/services/shared/src/utils/logger.ts
/**
 * Shared root logger (pino, stdout only).
 *
 * - Level comes from LOG_LEVEL (default "info"); an unknown level fails at import.
 * - `service` is stamped from SERVICE_NAME, which the service's bootstrap sets
 *   before this module is first imported.
 */

import pino, { type LevelWithSilent, type LoggerOptions } from "pino";

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function resolveLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? "").trim() || "info";
  if (!isLevel(v)) {
    throw new Error(`Invalid LOG_LEVEL: "${v}"`);
  }
  return v;
}

const SERVICE_NAME = process.env.SERVICE_NAME?.trim();

const pinoOptions: LoggerOptions = {
  level: resolveLevel(process.env.LOG_LEVEL),
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.headers['x-api-key']",
      "res.headers['set-cookie']",
    ],
  },
};

export const logger = pino(pinoOptions);

export type Logger = typeof logger;
