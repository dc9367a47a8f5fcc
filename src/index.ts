/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the backend application.
 * - Keeps startup logic small: load config -> logger (+ hourly log retention) -> supervise
 *   (stores, routes, listen, shutdown).
 */

import { buildConfig } from './app/config';
import { StartupError } from './app/lifecycle-errors';
import { superviseService } from './app/supervisor';
import {
  createConsoleLogger,
  createLogger,
  errorFields,
  flushLogger,
  pruneExpiredLogs,
  scheduleLogPruning,
} from './shared/logger/logger';

async function main(): Promise<number> {
  const config = StartupError.wrapSync('config', () => buildConfig());

  const logger = StartupError.wrapSync('logger', () =>
    createLogger(config.log, { service: config.serviceName, env: config.nodeEnv }),
  );

  let exitCode: number;
  const pruning = scheduleLogPruning(config.log, logger);
  try {
    const removed = await StartupError.wrap('logger', () => pruneExpiredLogs(config.log));
    logger.debug('logger.init', { flow: 'startup', level: config.log.level, prunedFiles: removed.length });

    const report = await superviseService({ config, logger });
    exitCode = report.exitCode;
  } catch (err) {
    logger.error('server.fatal_startup_error', {
      stage: err instanceof StartupError ? err.stage : null,
      ...errorFields(err),
    });
    exitCode = 1;
  } finally {
    pruning.stop();
  }

  await flushLogger(logger);
  return exitCode;
}

void main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    // Config or logger construction failed: no configured logger exists yet.
    createConsoleLogger().error('server.fatal_startup_error', {
      stage: err instanceof StartupError ? err.stage : null,
      ...errorFields(err),
    });
    process.exit(1);
  },
);
