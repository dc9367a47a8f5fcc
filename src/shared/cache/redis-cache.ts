/**
 * src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of CacheConnection. The client is private: callers get
 *   Cache operations + ping + close, never the raw client.
 *
 * IMPORTANT:
 * - Importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 * - node-redis reconnects forever by default, which would make connect() hang on a
 *   wrong host. Before the first successful connection we give up immediately
 *   (startup is fail-fast); after that the library's backoff applies.
 * - QUIT is a queued command: with the server gone it would wait in the offline queue
 *   forever. close() disconnects instead when the client is not ready, or when QUIT
 *   does not complete within quitTimeoutMs.
 *
 * LOGGING:
 * - Client-level events fire outside any request context, so they go to the
 *   injected logger directly.
 */

import { ClientClosedError, createClient } from 'redis';

import type { RedisConfig } from '../../app/config';
import type { CacheConnection, CacheSetOptions } from './cache';
import { errorFields } from '../logger/logger';
import type { Logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

const MAX_RECONNECT_DELAY_MS = 2_000;
const DEFAULT_QUIT_TIMEOUT_MS = 1_000;

export type RedisCacheDeps = {
  logger: Logger;
  /** How long close() waits for QUIT before dropping the socket. */
  quitTimeoutMs?: number;
};

/**
 * Reconnect policy: fail on the very first error until `hasConnected()` is true,
 * then back off linearly (50ms per attempt, capped).
 */
export function buildReconnectStrategy(hasConnected: () => boolean) {
  return (retries: number): number | Error => {
    if (!hasConnected()) {
      return new Error('redis: initial connection failed');
    }
    return Math.min(retries * 50, MAX_RECONNECT_DELAY_MS);
  };
}

export class RedisCache implements CacheConnection {
  private constructor(
    private readonly client: RedisClient,
    private readonly logger: Logger,
    private readonly quitTimeoutMs: number,
  ) {}

  static async connect(cfg: RedisConfig, deps: RedisCacheDeps): Promise<RedisCache> {
    const { logger } = deps;
    let connected = false;

    const client = createClient({
      socket: {
        host: cfg.host,
        port: cfg.port,
        connectTimeout: 5_000,
        reconnectStrategy: buildReconnectStrategy(() => connected),
      },
      password: cfg.password ?? undefined,
      database: cfg.db,
    });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        ...errorFields(err),
      });
    });

    client.on('reconnecting', () => {
      logger.warn('redis.reconnecting', { flow: 'redis' });
    });

    try {
      await client.connect();
    } catch (err) {
      logger.error('redis.connect_failed', {
        flow: 'redis',
        host: cfg.host,
        port: cfg.port,
        db: cfg.db,
        ...errorFields(err),
      });
      throw err;
    }

    connected = true;
    logger.info('redis.connected', { flow: 'redis', host: cfg.host, port: cfg.port, db: cfg.db });

    return new RedisCache(client, logger, deps.quitTimeoutMs ?? DEFAULT_QUIT_TIMEOUT_MS);
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) return;

    if (!this.client.isReady) {
      await this.client.disconnect();
      this.logger.warn('redis.closed', { flow: 'redis', graceful: false });
      return;
    }

    const quitting = this.client.quit();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.quitTimeoutMs);
    });

    let outcome: 'quit' | 'failed' | 'timeout';
    try {
      outcome = await Promise.race([
        quitting.then(
          () => 'quit' as const,
          (err: unknown) => {
            // Socket dropped while QUIT was queued: the connection is already gone.
            this.logger.warn('redis.quit_failed', { flow: 'redis', ...errorFields(err) });
            return 'failed' as const;
          },
        ),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }

    if (outcome === 'quit') {
      this.logger.info('redis.closed', { flow: 'redis', graceful: true });
      return;
    }

    if (outcome === 'timeout') {
      this.logger.warn('redis.quit_timeout', { flow: 'redis', quitTimeoutMs: this.quitTimeoutMs });
      await this.abandonQuit();
    }

    this.logger.warn('redis.closed', { flow: 'redis', graceful: false });
  }

  /**
   * quit() has already marked the client closed, so disconnect() rejects with
   * ClientClosedError; it still rejects every queued command first, QUIT included.
   */
  private async abandonQuit(): Promise<void> {
    try {
      await this.client.disconnect();
    } catch (err) {
      if (!(err instanceof ClientClosedError)) throw err;
    }
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const value = await this.client.incr(key);

    if (opts?.ttlSeconds) {
      const ttl = await this.client.ttl(key);
      if (ttl < 0) {
        await this.client.expire(key, opts.ttlSeconds);
      }
    }

    return value;
  }
}
