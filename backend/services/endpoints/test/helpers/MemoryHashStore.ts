// backend/services/endpoints/test/helpers/MemoryHashStore.ts
import type { HashStore } from "../../src/repo/HashStore";

function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split("")
    .map((ch) => {
      if (ch === "*") return ".*";
      if (ch === "?") return ".";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${body}$`);
}

/** In-process stand-in for Redis hashes. Insertion order = enumeration order. */
export class MemoryHashStore implements HashStore {
  readonly data = new Map<string, Map<string, string>>();

  async exists(key: string): Promise<boolean> {
    return (this.data.get(key)?.size ?? 0) > 0;
  }

  async getAll(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.data.get(key) ?? []);
  }

  async setAll(key: string, fields: Record<string, string>): Promise<void> {
    this.seed(key, fields);
  }

  async keys(pattern: string): Promise<string[]> {
    const re = globToRegExp(pattern);
    return [...this.data.keys()].filter((k) => re.test(k));
  }

  async ping(): Promise<void> {}

  /** Synchronous write, for arranging fixtures (including broken ones). */
  seed(key: string, fields: Record<string, string>): void {
    const hash = this.data.get(key) ?? new Map<string, string>();
    for (const [field, value] of Object.entries(fields)) hash.set(field, value);
    this.data.set(key, hash);
  }

  snapshot(key: string): Record<string, string> {
    return Object.fromEntries(this.data.get(key) ?? []);
  }
}
