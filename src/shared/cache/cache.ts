/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Short-lived shared state (counters, small payloads) must be fast and externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;
}

/**
 * A Cache that owns a live connection: what the composition root holds.
 * Request handlers only ever see `Cache` (+ ping for health checks).
 */
export interface CacheConnection extends Cache {
  ping(): Promise<void>;

  /** Releases the connection. Called at most once, by the supervisor. */
  close(): Promise<void>;
}
