/**
 * src/app/supervisor.ts
 *
 * WHY:
 * - Owns the process lifecycle: the listener never starts before the stores are ready,
 *   and the stores are never torn down before the listener has been told to stop.
 *
 * ORDER:
 * - start: stores (database, then cache) -> routes -> listen -> watch SIGINT/SIGTERM
 * - stop:  graceful close bounded by SHUTDOWN_DEADLINE_MS -> close stores (always, once)
 *
 * RULES:
 * - No retries. A startup failure releases whatever was opened and propagates as StartupError.
 * - A second signal during shutdown is logged and ignored.
 * - A listener error after startup is fatal, not a graceful stop: open connections are
 *   dropped without waiting, the stores are torn down, exit code 1.
 * - Dependencies (logger, signal source, store/app builders) are passed in, never global.
 */

import type { AddressInfo } from 'node:net';
import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { AppDeps } from './di';
import { buildApp } from './build-app';
import { ShutdownDeadlineError, StartupError } from './lifecycle-errors';
import { errorFields } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

export const SHUTDOWN_DEADLINE_MS = 5_000;

export const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type TerminationSignal = (typeof TERMINATION_SIGNALS)[number];

export type ShutdownReason =
  | { kind: 'signal'; signal: TerminationSignal }
  | { kind: 'listener_failed'; error: Error };

export type ShutdownReport = {
  reason: ShutdownReason;
  /** true when every in-flight request finished before the deadline */
  drained: boolean;
  /** ShutdownDeadlineError, a failed close, or StartupError('listen') for a listener failure */
  shutdownError: Error | null;
  /** one entry per store that failed to close */
  teardownErrors: unknown[];
  exitCode: 0 | 1;
};

export type SupervisorOptions = {
  config: AppConfig;
  logger: Logger;

  openStores?: (config: AppConfig, logger: Logger) => Promise<AppDeps>;
  buildApp?: (config: AppConfig, deps: AppDeps) => Promise<FastifyInstance>;

  /** Where termination signals come from. Defaults to `process`. */
  signals?: NodeJS.EventEmitter;

  /** Tests only. Production always uses SHUTDOWN_DEADLINE_MS. */
  shutdownDeadlineMs?: number;
};

export type RunningService = {
  app: FastifyInstance;
  deps: AppDeps;
  port: number;
  /** Settles once the service has fully stopped. Never rejects. */
  stopped: Promise<ShutdownReport>;
};

type StopResult = { drained: true } | { drained: false; error: Error };

/**
 * Graceful stop bounded by `deadlineMs`.
 * - app.close() stops accepting immediately and waits for in-flight requests.
 * - Past the deadline, remaining sockets are destroyed and a ShutdownDeadlineError is returned.
 */
export async function stopServer(app: FastifyInstance, deadlineMs: number, logger: Logger): Promise<StopResult> {
  const closing = app.close();

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'deadline'>((resolve) => {
    timer = setTimeout(() => resolve('deadline'), deadlineMs);
  });

  try {
    const outcome = await Promise.race([closing.then(() => 'closed' as const), deadline]);
    if (outcome === 'closed') return { drained: true };
  } catch (err) {
    logger.error('server.close_failed', { flow: 'shutdown', ...errorFields(err) });
    return { drained: false, error: err instanceof Error ? err : new Error(String(err)) };
  } finally {
    clearTimeout(timer);
  }

  const error = new ShutdownDeadlineError(deadlineMs);
  logger.error('server.shutdown_deadline_exceeded', {
    flow: 'shutdown',
    fatal: true,
    deadlineMs,
  });

  app.server.closeAllConnections();
  void closing.catch((err: unknown) => {
    logger.error('server.close_failed', { flow: 'shutdown', ...errorFields(err) });
  });

  return { drained: false, error };
}

/**
 * Immediate stop for a failed listener: stop accepting, destroy every socket, no drain.
 */
export async function abortServer(app: FastifyInstance, logger: Logger): Promise<void> {
  const closing = app.close();
  app.server.closeAllConnections();

  try {
    await closing;
  } catch (err) {
    logger.error('server.close_failed', { flow: 'shutdown', ...errorFields(err) });
  }
}

function listeningPort(app: FastifyInstance, fallback: number): number {
  const address: AddressInfo | string | null = app.server.address();
  return address && typeof address === 'object' ? address.port : fallback;
}

async function releaseAfterFailedStart(
  logger: Logger,
  deps: AppDeps,
  app: FastifyInstance | null,
): Promise<void> {
  if (app) {
    try {
      await app.close();
    } catch (err) {
      logger.error('server.close_failed', { flow: 'startup', ...errorFields(err) });
    }
  }

  try {
    await deps.close();
  } catch (err) {
    logger.error('stores.close_failed', { flow: 'startup', ...errorFields(err) });
  }
}

export async function startService(opts: SupervisorOptions): Promise<RunningService> {
  const { config, logger } = opts;
  const openStores = opts.openStores ?? buildDeps;
  const build = opts.buildApp ?? buildApp;
  const signals: NodeJS.EventEmitter = opts.signals ?? process;
  const deadlineMs = opts.shutdownDeadlineMs ?? SHUTDOWN_DEADLINE_MS;

  const deps = await StartupError.wrap('database', () => openStores(config, logger));

  const app = await StartupError.wrap('server', () => build(config, deps)).catch(async (err: unknown) => {
    await releaseAfterFailedStart(logger, deps, null);
    throw err;
  });

  await StartupError.wrap('listen', () => app.listen({ host: config.http.host, port: config.http.port })).catch(
    async (err: unknown) => {
      await releaseAfterFailedStart(logger, deps, app);
      throw err;
    },
  );

  const port = listeningPort(app, config.http.port);

  logger.info('server.listening', {
    host: config.http.host,
    port,
    env: config.nodeEnv,
    service: config.serviceName,
  });

  let stopping = false;
  let requestStop: (reason: ShutdownReason) => void = () => undefined;
  const stopRequested = new Promise<ShutdownReason>((resolve) => {
    requestStop = resolve;
  });

  const trigger = (reason: ShutdownReason) => {
    if (stopping) {
      logger.warn('server.shutdown_in_progress', {
        flow: 'shutdown',
        ignored: reason.kind === 'signal' ? reason.signal : 'listener_failed',
      });
      return;
    }
    stopping = true;
    requestStop(reason);
  };

  const signalListeners = TERMINATION_SIGNALS.map((signal) => {
    const listener = () => trigger({ kind: 'signal', signal });
    signals.on(signal, listener);
    return { signal, listener };
  });

  const onServerError = (error: Error) => trigger({ kind: 'listener_failed', error });
  app.server.on('error', onServerError);

  const stopped = (async (): Promise<ShutdownReport> => {
    const reason = await stopRequested;

    let result: StopResult;
    if (reason.kind === 'signal') {
      logger.info('server.shutdown', { flow: 'shutdown', signal: reason.signal, deadlineMs });
      result = await stopServer(app, deadlineMs, logger);
    } else {
      const error = new StartupError('listen', reason.error);
      logger.error('server.listener_failed', { flow: 'shutdown', fatal: true, ...errorFields(error) });
      await abortServer(app, logger);
      result = { drained: false, error };
    }

    // Stores go last: only after the listener has stopped, whatever the outcome.
    let teardownErrors: unknown[] = [];
    try {
      await deps.close();
    } catch (err) {
      teardownErrors = err instanceof AggregateError ? err.errors : [err];
    }

    for (const { signal, listener } of signalListeners) {
      signals.removeListener(signal, listener);
    }
    app.server.removeListener('error', onServerError);

    const clean = reason.kind === 'signal' && result.drained && teardownErrors.length === 0;
    const report: ShutdownReport = {
      reason,
      drained: result.drained,
      shutdownError: result.drained ? null : result.error,
      teardownErrors,
      exitCode: clean ? 0 : 1,
    };

    logger.info('server.stopped', {
      flow: 'shutdown',
      reason: reason.kind,
      drained: report.drained,
      exitCode: report.exitCode,
    });

    return report;
  })();

  return { app, deps, port, stopped };
}

/**
 * start + block until a termination signal (or listener failure) has been fully handled.
 */
export async function superviseService(opts: SupervisorOptions): Promise<ShutdownReport> {
  const running = await startService(opts);
  return running.stopped;
}
