/**
 * Key/value store with per-entry expiry backing the session cache.
 * Implementations may be remote; callers treat every failure as a cache miss.
 */
export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  delete(...keys: string[]): Promise<void>;
}
