/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; routes are added by app/routes.ts.
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }): Promise<FastifyInstance> {
  const { logger } = opts.deps;

  const app = Fastify({
    logger: false, // we use our own winston logger
    trustProxy: opts.config.nodeEnv === 'production',
    // Lets the supervisor's drain finish: idle keep-alive sockets are closed on app.close().
    forceCloseConnections: 'idle',
  });

  registerRequestContext(app);

  // One line per completed request (status + latency), after the reply is sent.
  app.addHook('onResponse', async (req, reply) => {
    const [path, query = ''] = req.url.split('?', 2);

    withRequestContext(logger, req).info('request', {
      status: reply.statusCode,
      path,
      query,
      ip: req.ip,
      userAgent: req.headers['user-agent'] ?? null,
      elapsedMs: Math.round(reply.elapsedTime),
    });
  });

  // Last: the not-found handler picks up the hooks registered above.
  registerErrorHandler(app, logger);

  return app;
}
