// backend/services/endpoints/src/models/Endpoint.ts
import type { Duration } from "../lib/duration";

/** One monitored target's configuration. All six fields are always present. */
export interface Endpoint {
  /** Storage key; matches IDENTIFIER_PATTERN. */
  identifier: string;
  /** Absolute URL with a host, as submitted (trimmed). */
  url: string;
  /** HTTP verb token, stored verbatim. */
  method: string;
  /** Status code considered healthy, 0..65535. */
  statusOnline: number;
  /** How often the endpoint should be checked. */
  frequency: Duration;
  /** Consecutive failures before the endpoint counts as down, 0..255. */
  failAfter: number;
}

/** Structured (wire) form. Field names are part of the public contract. */
export interface EndpointPayload {
  identifier: string;
  url: string;
  method: string;
  status_online: number;
  frequency: string;
  fail_after: number;
}

/** Flat (store) form: one hash per endpoint, every value a string. */
export type EndpointHash = Record<keyof EndpointPayload, string>;

export const MAX_STATUS_ONLINE = 65_535;
export const MAX_FAIL_AFTER = 255;
