/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them.
 * - Keeps everything testable: the store factories can be swapped for in-process stand-ins.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Stores open in order (database, then cache) and each failure is fatal.
 *   If the cache fails, the database that already opened is closed before rethrowing.
 */

import type { AppConfig, DatabaseConfig, RedisConfig } from './config';
import { StartupError } from './lifecycle-errors';

import { Database } from '../shared/db/db';
import { RedisCache } from '../shared/cache/redis-cache';
import type { CacheConnection } from '../shared/cache/cache';

import { errorFields } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

export type StoreFactories = {
  openDatabase: (cfg: DatabaseConfig, logger: Logger) => Promise<Database>;
  openCache: (cfg: RedisConfig, logger: Logger) => Promise<CacheConnection>;
};

export const defaultStoreFactories: StoreFactories = {
  openDatabase: (cfg, logger) => Database.connect(cfg, { logger }),
  openCache: (cfg, logger) => RedisCache.connect(cfg, { logger }),
};

export type AppDeps = {
  db: Database;
  cache: CacheConnection;

  logger: Logger;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  logger: Logger,
  factories: Partial<StoreFactories> = {},
): Promise<AppDeps> {
  const { openDatabase, openCache } = { ...defaultStoreFactories, ...factories };

  const db = await StartupError.wrap('database', () => openDatabase(config.database, logger));

  let cache: CacheConnection;
  try {
    cache = await StartupError.wrap('cache', () => openCache(config.redis, logger));
  } catch (err) {
    await closeQuietly(logger, 'db', () => db.close());
    throw err;
  }

  return {
    db,
    cache,
    logger,
    close: async () => {
      const failures = await closeStores(logger, { db, cache });
      if (failures.length > 0) {
        throw new AggregateError(failures, 'store teardown failed');
      }
    },
  };
}

/**
 * Closes both stores independently; one failing does not skip the other.
 * Resolves with the failures (empty when everything closed cleanly).
 */
async function closeStores(
  logger: Logger,
  stores: { db: Database; cache: CacheConnection },
): Promise<unknown[]> {
  const results = await Promise.allSettled([stores.db.close(), stores.cache.close()]);

  const failures: unknown[] = [];
  for (const [i, result] of results.entries()) {
    if (result.status === 'rejected') {
      logger.error('stores.close_failed', {
        flow: 'shutdown',
        store: i === 0 ? 'db' : 'cache',
        ...errorFields(result.reason),
      });
      failures.push(result.reason);
    }
  }

  return failures;
}

async function closeQuietly(logger: Logger, store: string, close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (err) {
    // The startup error being propagated is the one the operator needs; this is secondary.
    logger.error('stores.close_failed', { flow: 'startup', store, ...errorFields(err) });
  }
}
