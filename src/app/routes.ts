/**
 * src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes as they are added
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';

export type CheckStatus = 'up' | 'down';

export type HealthResponse = {
  ok: boolean;
  env: string;
  service: string;
  requestId: string;
  checks: {
    database: CheckStatus;
    cache: CheckStatus;
  };
};

async function probe(check: () => Promise<void>): Promise<{ status: CheckStatus; error?: string }> {
  try {
    await check();
    return { status: 'up' };
  } catch (err) {
    return { status: 'down', error: err instanceof Error ? err.message : String(err) };
  }
}

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  const { config, deps } = opts;

  // Readiness for platform checks: both stores must answer.
  app.get('/health', async (req, reply) => {
    const [database, cache] = await Promise.all([
      probe(() => deps.db.ping()),
      probe(() => deps.cache.ping()),
    ]);

    const ok = database.status === 'up' && cache.status === 'up';

    if (!ok) {
      withRequestContext(deps.logger, req).warn('health.degraded', {
        flow: 'health',
        database: database.error ?? database.status,
        cache: cache.error ?? cache.status,
      });
    }

    const body: HealthResponse = {
      ok,
      env: config.nodeEnv,
      service: config.serviceName,
      requestId: req.requestContext.requestId,
      checks: { database: database.status, cache: cache.status },
    };

    return reply.status(ok ? 200 : 503).send(body);
  });
}
