// backend/services/endpoints/src/repo/endpointRepo.ts

/**
 * Registry store adapter: one hash per endpoint under `endpoint:<identifier>`.
 *
 * Invariants:
 * - The store is the only copy; nothing is cached here.
 * - put() is a single HSET of all six fields (no partial records).
 * - Every store rejection surfaces as StoreUnavailableError; listAll() never
 *   returns partial results.
 */

import { StoreUnavailableError } from "../errors";
import { fromHash, toHash } from "../mappers/endpoint.mapper";
import type { Endpoint } from "../models/Endpoint";
import type { HashStore } from "./HashStore";

export const KEY_PREFIX = "endpoint:";

export function endpointKey(identifier: string): string {
  return KEY_PREFIX + identifier;
}

export class EndpointRepo {
  constructor(private readonly store: HashStore) {}

  private async call<T>(op: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailableError(op, key, err);
    }
  }

  async exists(identifier: string): Promise<boolean> {
    const key = endpointKey(identifier);
    return this.call("exists", key, () => this.store.exists(key));
  }

  /** Null when nothing is stored for the identifier. */
  async get(identifier: string): Promise<Endpoint | null> {
    const key = endpointKey(identifier);
    const fields = await this.call("hgetall", key, () => this.store.getAll(key));
    if (Object.keys(fields).length === 0) return null;
    return fromHash(key, fields);
  }

  async put(endpoint: Endpoint): Promise<void> {
    const key = endpointKey(endpoint.identifier);
    await this.call("hset", key, () => this.store.setAll(key, toHash(endpoint)));
  }

  /**
   * Every stored endpoint, in store enumeration order. Keys that disappear
   * between enumeration and read are skipped.
   */
  async listAll(): Promise<Endpoint[]> {
    const pattern = `${KEY_PREFIX}*`;
    const keys = await this.call("keys", pattern, () => this.store.keys(pattern));

    const rows = await Promise.all(
      keys.map((key) => this.call("hgetall", key, () => this.store.getAll(key)))
    );

    const out: Endpoint[] = [];
    rows.forEach((fields, i) => {
      if (Object.keys(fields).length > 0) out.push(fromHash(keys[i], fields));
    });
    return out;
  }

  async ping(): Promise<void> {
    await this.call("ping", "-", () => this.store.ping());
  }
}
