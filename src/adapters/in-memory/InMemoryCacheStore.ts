/* eslint-disable functional/immutable-data */
import type { CacheStore } from "../../domain/ports/CacheStore.js";
import type { TimePoint } from "../../domain/typedefs.js";

interface Entry {
  readonly value: string;
  readonly expiresAt: TimePoint;
}

/**
 * Process-local cache with lazy expiry. The clock is injectable so tests can
 * move time forward without fake timers.
 */
export class InMemoryCacheStore implements CacheStore {
  #entries = new Map<string, Entry>();
  readonly #now: () => TimePoint;

  constructor(now: () => TimePoint = Date.now) {
    this.#now = now;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this.#entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.#now()) {
      this.#entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    if (!(ttlMs > 0)) {
      throw new Error("Cache TTL must be greater than 0");
    }
    this.#entries.set(key, { value, expiresAt: this.#now() + ttlMs });
  }

  async delete(...keys: string[]): Promise<void> {
    for (const key of keys) {
      this.#entries.delete(key);
    }
  }

  get size(): number {
    return this.#entries.size;
  }
}
