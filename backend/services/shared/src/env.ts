// backend/services/shared/src/env.ts

/**
 * Env loading + validators shared by service bootstraps and configs.
 *
 * - loadEnvFile(): loads ENV_FILE (absolute, or relative to cwd) or ./.env.
 *   A missing file is fine; values injected by the environment always win.
 * - requireEnv/optionalEnv/optionalNumber: fail fast with the var name.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export type Env = Record<string, string | undefined>;

export function loadEnvFile(env: Env = process.env): string | null {
  const file = path.resolve(process.cwd(), env.ENV_FILE || ".env");
  if (!fs.existsSync(file)) return null;

  const result = dotenv.config({ path: file });
  if (result.error) {
    throw new Error(`Failed to load env file: ${file} — ${String(result.error)}`);
  }
  return file;
}

export function requireEnv(env: Env, name: string): string {
  const v = env[name];
  if (v == null || v.trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

export function optionalEnv(env: Env, name: string, fallback: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? fallback : v.trim();
}

function toNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

export function optionalNumber(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return fallback;
  return toNumber(name, v.trim());
}
