/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One way to build structured JSON loggers (winston) from LogConfig.
 * - Stable metadata (service, env) on every line for log querying.
 * - Optional file output with size rotation + age retention for hosts without a log shipper.
 *
 * HOW TO USE:
 * - createLogger(config.log, { service, env }) once in src/index.ts.
 * - Pass the returned Logger into whatever needs it (di, connectors, server, supervisor).
 *   There is NO module-level logger; nothing logs through ambient global state.
 * - Prefer `withRequestContext(logger, req)` inside request handlers.
 * - Never put a raw Error in meta: spread `errorFields(err)` so message + stack survive.
 */

import path from 'node:path';
import { readdir, stat, unlink } from 'node:fs/promises';
import winston from 'winston';

import type { LogConfig } from '../../app/config';

export type Logger = winston.Logger;

export type LoggerMeta = {
  service: string;
  env: string;
};

const MIB = 1024 * 1024;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const LOG_PRUNE_INTERVAL_MS = HOUR_MS;

function jsonFormat() {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  );
}

/**
 * File transport with winston's built-in size rotation.
 * - tailable: the active file keeps its name; app1.log is the most recent backup.
 * - maxBackups 0 keeps every rotated file, maxSizeMB 0 disables size rotation.
 */
export function buildFileTransport(log: LogConfig & { filename: string }) {
  return new winston.transports.File({
    filename: log.filename,
    maxsize: log.maxSizeMB > 0 ? log.maxSizeMB * MIB : undefined,
    maxFiles: log.maxBackups > 0 ? log.maxBackups + 1 : undefined,
    tailable: true,
  });
}

export function createLogger(log: LogConfig, meta: LoggerMeta): Logger {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (log.filename) {
    transports.push(buildFileTransport({ ...log, filename: log.filename }));
  }

  return winston.createLogger({
    level: log.level,
    format: jsonFormat(),
    defaultMeta: meta,
    transports,
  });
}

/**
 * Error -> plain fields. winston's json format drops Error instances nested in meta,
 * and a `message` key would be appended to the log message itself.
 */
export function errorFields(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}

/**
 * Console-only logger for failures that happen before config is loaded.
 */
export function createConsoleLogger(): Logger {
  return winston.createLogger({
    level: 'info',
    format: jsonFormat(),
    transports: [new winston.transports.Console()],
  });
}

/**
 * Deletes rotated siblings of `log.filename` (app1.log, app2.log, ...) whose
 * mtime is older than maxAgeDays. The active file is never touched.
 * Returns the deleted paths.
 */
export async function pruneExpiredLogs(log: LogConfig, now: number = Date.now()): Promise<string[]> {
  if (!log.filename || log.maxAgeDays <= 0) return [];

  const dir = path.dirname(log.filename);
  const ext = path.extname(log.filename);
  const base = path.basename(log.filename, ext);
  const cutoff = now - log.maxAgeDays * DAY_MS;

  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const removed: string[] = [];
  for (const name of entries) {
    if (!isRotatedSibling(name, base, ext)) continue;

    const full = path.join(dir, name);
    const info = await stat(full);
    if (info.mtimeMs < cutoff) {
      await unlink(full);
      removed.push(full);
    }
  }

  return removed.sort();
}

export type LogPruning = {
  stop: () => void;
};

/**
 * Re-runs pruneExpiredLogs every `intervalMs` for as long as the process lives,
 * so backups that age out after startup are removed too. The timer is unref'd;
 * call stop() at shutdown.
 */
export function scheduleLogPruning(
  log: LogConfig,
  logger: Logger,
  intervalMs: number = LOG_PRUNE_INTERVAL_MS,
): LogPruning {
  if (!log.filename || log.maxAgeDays <= 0) return { stop: () => undefined };

  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;

    void pruneExpiredLogs(log)
      .then((removed) => {
        if (removed.length > 0) logger.info('logger.pruned', { flow: 'logger', files: removed });
      })
      .catch((err: unknown) => {
        logger.error('logger.prune_failed', { flow: 'logger', ...errorFields(err) });
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref();

  return { stop: () => clearInterval(timer) };
}

function isRotatedSibling(name: string, base: string, ext: string): boolean {
  if (!name.startsWith(base) || !name.endsWith(ext)) return false;
  const middle = name.slice(base.length, name.length - ext.length);
  return /^\d+$/.test(middle);
}

/**
 * Ends the logger and resolves once every transport has finished writing.
 * The logger's own 'finish' only means entries were handed to the transports,
 * so waiting on it can still lose the last file lines at process.exit.
 * Bounded by `timeoutMs` so a stuck transport cannot block exit.
 */
export async function flushLogger(logger: Logger, timeoutMs = 2_000): Promise<void> {
  const finished = logger.transports.map(
    (transport) => new Promise<void>((resolve) => transport.once('finish', () => resolve())),
  );

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, timeoutMs);
  });

  logger.end();

  try {
    await Promise.race([Promise.all(finished).then(() => undefined), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
