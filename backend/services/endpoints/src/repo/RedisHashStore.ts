// backend/services/endpoints/src/repo/RedisHashStore.ts
import type { RedisClient } from "@shared/src/utils/redis";
import type { HashStore } from "./HashStore";

/** HashStore over node-redis: EXISTS, HGETALL, HSET, KEYS, PING. */
export class RedisHashStore implements HashStore {
  constructor(private readonly client: RedisClient) {}

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) > 0;
  }

  async getAll(key: string): Promise<Record<string, string>> {
    const raw = await this.client.hGetAll(key);
    const out: Record<string, string> = {};
    for (const [field, value] of Object.entries(raw)) {
      out[field] = value.toString();
    }
    return out;
  }

  async setAll(key: string, fields: Record<string, string>): Promise<void> {
    await this.client.hSet(key, fields);
  }

  async keys(pattern: string): Promise<string[]> {
    const keys = await this.client.keys(pattern);
    return keys.map((k) => k.toString());
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }
}
