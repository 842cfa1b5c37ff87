// backend/services/endpoints/src/repo/HashStore.ts

/**
 * Narrow port onto a hash-per-key store (Redis/Valkey in production, an
 * in-memory map in tests). Implementations reject on any transport or store
 * failure; EndpointRepo turns those rejections into StoreUnavailableError.
 */
export interface HashStore {
  /** True iff at least one field is stored under `key`. */
  exists(key: string): Promise<boolean>;
  /** All fields under `key`; an empty object when the key is absent. */
  getAll(key: string): Promise<Record<string, string>>;
  /** Write every field in one command, overwriting existing values. */
  setAll(key: string, fields: Record<string, string>): Promise<void>;
  /** Keys matching a glob-style pattern, in store enumeration order. */
  keys(pattern: string): Promise<string[]>;
  /** Round trip to the store. */
  ping(): Promise<void>;
}
