// backend/services/endpoints/src/mappers/endpoint.mapper.ts

/**
 * Endpoint ⇄ structured form (JSON payload) and Endpoint ⇄ flat form (hash).
 *
 * Notes:
 * - The JSON decoders throw MalformedPayloadError.
 * - fromHash() throws CorruptRecordError for an unreadable identifier, URL or
 *   frequency. Numeric fields are decoded best-effort: anything that isn't a
 *   decimal integer inside the field's range reads as 0. Stored records keep
 *   loading with that lenience; it is not upgraded to a hard failure here.
 */

import { formatDuration, parseDuration, DurationParseError } from "../lib/duration";
import { isIdentifier } from "../lib/identifier";
import { absoluteUrl, zEndpointPayload } from "../contracts/endpoint.contract";
import { CorruptRecordError, MalformedPayloadError } from "../errors";
import {
  MAX_FAIL_AFTER,
  MAX_STATUS_ONLINE,
  type Endpoint,
  type EndpointHash,
  type EndpointPayload,
} from "../models/Endpoint";

// ── Structured form ─────────────────────────────────────────────────────────

export function toPayload(e: Endpoint): EndpointPayload {
  return {
    identifier: e.identifier,
    url: e.url,
    method: e.method,
    status_online: e.statusOnline,
    frequency: formatDuration(e.frequency),
    fail_after: e.failAfter,
  };
}

export function fromPayload(body: unknown): Endpoint {
  const parsed = zEndpointPayload.safeParse(body);
  if (!parsed.success) {
    throw new MalformedPayloadError(
      parsed.error.issues.map((i) =>
        i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message
      )
    );
  }
  const p = parsed.data;
  return {
    identifier: p.identifier,
    url: p.url,
    method: p.method,
    statusOnline: p.status_online,
    frequency: p.frequency,
    failAfter: p.fail_after,
  };
}

export function toJson(e: Endpoint): string {
  return JSON.stringify(toPayload(e));
}

export function fromJson(text: string): Endpoint {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    throw new MalformedPayloadError([
      `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  return fromPayload(body);
}

// ── Flat form ───────────────────────────────────────────────────────────────

export function toHash(e: Endpoint): EndpointHash {
  return {
    identifier: e.identifier,
    url: e.url,
    method: e.method,
    status_online: String(e.statusOnline),
    frequency: formatDuration(e.frequency),
    fail_after: String(e.failAfter),
  };
}

function lenientUint(raw: string | undefined, max: number): number {
  if (raw === undefined || !/^[+-]?\d+$/.test(raw)) return 0;
  const n = Number(raw);
  return n >= 0 && n <= max ? n : 0;
}

export function fromHash(key: string, fields: Record<string, string>): Endpoint {
  const identifier = fields.identifier ?? "";
  if (!isIdentifier(identifier)) {
    throw new CorruptRecordError(key, `invalid identifier "${identifier}"`);
  }

  const url = absoluteUrl(fields.url ?? "");
  if (url === null) {
    throw new CorruptRecordError(key, `invalid url "${fields.url ?? ""}"`);
  }

  let frequency: bigint;
  try {
    frequency = parseDuration(fields.frequency ?? "");
  } catch (err) {
    if (!(err instanceof DurationParseError)) throw err;
    throw new CorruptRecordError(key, err.message);
  }

  return {
    identifier,
    url,
    method: fields.method ?? "",
    statusOnline: lenientUint(fields.status_online, MAX_STATUS_ONLINE),
    frequency,
    failAfter: lenientUint(fields.fail_after, MAX_FAIL_AFTER),
  };
}
