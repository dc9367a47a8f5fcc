import { describe, it, expect, vi } from 'vitest';
import { DummyDriver, sql } from 'kysely';

import { Database, buildPoolConfig } from '../../../../src/shared/db/db';
import type { DatabaseConfig } from '../../../../src/app/config';
import { FailingDriver, capturingLogger, silentLogger, testDialect } from '../../../helpers/build-test-app';

const cfg: DatabaseConfig = {
  host: 'db.internal',
  port: 5433,
  user: 'scaffold',
  password: 'test-secret',
  databaseName: 'scaffold_test',
  maxOpenConnections: 20,
  maxIdleConnections: 4,
};

describe('buildPoolConfig', () => {
  it('maps connection settings and pool sizes onto pg options', () => {
    expect(buildPoolConfig(cfg)).toEqual({
      host: 'db.internal',
      port: 5433,
      user: 'scaffold',
      password: 'test-secret',
      database: 'scaffold_test',
      max: 20,
      min: 4,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 10_000,
    });
  });

  it('never keeps more idle connections than it may open', () => {
    const pool = buildPoolConfig({ ...cfg, maxOpenConnections: 3, maxIdleConnections: 8 });

    expect(pool.max).toBe(3);
    expect(pool.min).toBe(3);
  });
});

describe('Database', () => {
  it('connect verifies the pool, then execute/ping run through it', async () => {
    const driver = new DummyDriver();
    const acquire = vi.spyOn(driver, 'acquireConnection');

    const db = await Database.connect(cfg, { logger: silentLogger(), dialect: testDialect(driver) });
    expect(acquire).toHaveBeenCalledTimes(1);

    await expect(db.execute(sql<{ id: number }>`select id from things`)).resolves.toEqual([]);
    await expect(db.ping()).resolves.toBeUndefined();
    expect(acquire).toHaveBeenCalledTimes(3);

    await db.close();
  });

  it('close destroys the underlying driver once', async () => {
    const driver = new DummyDriver();
    const destroy = vi.spyOn(driver, 'destroy');

    const db = await Database.connect(cfg, { logger: silentLogger(), dialect: testDialect(driver) });
    await db.close();

    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('connect fails fast with the driver error and releases the pool', async () => {
    const driver = new FailingDriver(new Error('connect ECONNREFUSED 127.0.0.1:5433'));
    const destroy = vi.spyOn(driver, 'destroy');
    const { logger, entries } = capturingLogger();

    await expect(Database.connect(cfg, { logger, dialect: testDialect(driver) })).rejects.toThrowError(
      'connect ECONNREFUSED 127.0.0.1:5433',
    );

    expect(destroy).toHaveBeenCalledTimes(1);

    await vi.waitFor(() => {
      const failure = entries.find((e) => e.message === 'db.connect_failed');
      expect(failure).toMatchObject({
        level: 'error',
        host: 'db.internal',
        port: 5433,
        database: 'scaffold_test',
        error: 'connect ECONNREFUSED 127.0.0.1:5433',
      });
    });
  });
});
