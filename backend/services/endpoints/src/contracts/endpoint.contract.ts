// backend/services/endpoints/src/contracts/endpoint.contract.ts

/**
 * Wire contract for the structured form.
 * Parsing normalizes on the way in: `url` is checked and trimmed, `frequency`
 * becomes a Duration, so a parsed payload maps 1:1 onto the Endpoint model.
 * Unknown fields are stripped.
 */

import { z } from "zod";
import { IDENTIFIER_PATTERN } from "../lib/identifier";
import { parseDuration, DurationParseError } from "../lib/duration";
import { MAX_FAIL_AFTER, MAX_STATUS_ONLINE } from "../models/Endpoint";

/**
 * The trimmed input when it parses as an absolute URL with a host, else null.
 * The caller's spelling is kept: no added "/", host case and port untouched.
 */
export function absoluteUrl(raw: string): string | null {
  const trimmed = raw.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return null;
  }
  return parsed.host === "" ? null : trimmed;
}

export const zIdentifier = z
  .string()
  .regex(IDENTIFIER_PATTERN, "identifier must match [a-z][-a-z0-9]+");

export const zAbsoluteUrl = z.string().transform((raw, ctx) => {
  const url = absoluteUrl(raw);
  if (url === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid absolute URL "${raw}"`,
    });
    return z.NEVER;
  }
  return url;
});

export const zDuration = z.string().transform((raw, ctx) => {
  try {
    return parseDuration(raw);
  } catch (err) {
    if (!(err instanceof DurationParseError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
    return z.NEVER;
  }
});

export const zEndpointPayload = z.object({
  identifier: zIdentifier,
  url: zAbsoluteUrl,
  method: z.string(),
  status_online: z.number().int().min(0).max(MAX_STATUS_ONLINE),
  frequency: zDuration,
  fail_after: z.number().int().min(0).max(MAX_FAIL_AFTER),
});

export type ParsedEndpointPayload = z.output<typeof zEndpointPayload>;
