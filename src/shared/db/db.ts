/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to open the relational store (Kysely over a pg pool).
 * - The pool is owned by Database and never handed out: callers get
 *   execute / ping / close and nothing else.
 *
 * HOW TO USE:
 * - const db = await Database.connect(config.database, { logger })
 * - await db.execute(sql<{ id: string }>`select id from things`)
 * - db.close() exactly once, after the HTTP listener has stopped.
 *
 * RULES:
 * - connect() is fail-fast: the pool is verified with `select 1` before it is returned.
 *   pg connects lazily, so without this a bad DSN would surface on the first request.
 */

import pg from 'pg';
import type { PoolConfig } from 'pg';
import { Kysely, PostgresDialect, sql } from 'kysely';
import type { Dialect, RawBuilder } from 'kysely';

import type { DatabaseConfig } from '../../app/config';
import { errorFields } from '../logger/logger';
import type { Logger } from '../logger/logger';

/**
 * The scaffold ships no tables. Modules extend this as they add schema.
 */
export type DB = Record<string, never>;

export type DatabaseDeps = {
  logger: Logger;
  /** Override the pg dialect (tests use an in-process driver). */
  dialect?: Dialect;
};

/**
 * Maps DatabaseConfig onto pg pool options.
 * - max: hard cap on open connections.
 * - min: idle connections kept warm; never more than max.
 */
export function buildPoolConfig(cfg: DatabaseConfig): PoolConfig {
  return {
    host: cfg.host,
    port: cfg.port,
    user: cfg.user,
    password: cfg.password,
    database: cfg.databaseName,
    max: cfg.maxOpenConnections,
    min: Math.min(cfg.maxIdleConnections, cfg.maxOpenConnections),
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  };
}

export class Database {
  private constructor(
    private readonly db: Kysely<DB>,
    private readonly logger: Logger,
  ) {}

  static async connect(cfg: DatabaseConfig, deps: DatabaseDeps): Promise<Database> {
    const dialect = deps.dialect ?? Database.postgresDialect(cfg, deps.logger);
    const db = new Kysely<DB>({ dialect });

    try {
      await sql`select 1`.execute(db);
    } catch (err) {
      deps.logger.error('db.connect_failed', {
        flow: 'db',
        host: cfg.host,
        port: cfg.port,
        database: cfg.databaseName,
        ...errorFields(err),
      });
      await db.destroy();
      throw err;
    }

    deps.logger.info('db.connected', {
      flow: 'db',
      host: cfg.host,
      port: cfg.port,
      database: cfg.databaseName,
      maxOpenConnections: cfg.maxOpenConnections,
    });

    return new Database(db, deps.logger);
  }

  private static postgresDialect(cfg: DatabaseConfig, logger: Logger): Dialect {
    const pool = new pg.Pool(buildPoolConfig(cfg));

    pool.on('error', (err: Error) => {
      // Idle-client error: no request context available.
      logger.error('db.pool_error', {
        flow: 'db',
        ...errorFields(err),
      });
    });

    return new PostgresDialect({ pool });
  }

  async execute<Row>(query: RawBuilder<Row>): Promise<Row[]> {
    const result = await query.execute(this.db);
    return result.rows;
  }

  async ping(): Promise<void> {
    await sql`select 1`.execute(this.db);
  }

  async close(): Promise<void> {
    await this.db.destroy();
    this.logger.info('db.closed', { flow: 'db' });
  }
}
