/**
 * src/app/lifecycle-errors.ts
 *
 * WHY:
 * - Startup failures must say WHICH stage failed (config, logger, stores, listener)
 *   while keeping the underlying error intact for the operator.
 * - Shutdown has exactly one failure of its own: the drain deadline.
 *
 * RULES:
 * - Always keep the original error as `cause`.
 * - No HTTP concerns here (see shared/http/errors.ts for request errors).
 */

export const STARTUP_STAGES = ['config', 'logger', 'database', 'cache', 'server', 'listen'] as const;

export type StartupStage = (typeof STARTUP_STAGES)[number];

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class StartupError extends Error {
  readonly stage: StartupStage;

  constructor(stage: StartupStage, cause: unknown) {
    super(`${stage} init failed: ${describe(cause)}`, { cause });
    this.name = 'StartupError';
    this.stage = stage;
  }

  /**
   * Runs `fn` and tags any failure with `stage`.
   * An error that is already a StartupError passes through unchanged.
   */
  static async wrap<T>(stage: StartupStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StartupError) throw err;
      throw new StartupError(stage, err);
    }
  }

  static wrapSync<T>(stage: StartupStage, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StartupError) throw err;
      throw new StartupError(stage, err);
    }
  }
}

export class ShutdownDeadlineError extends Error {
  readonly deadlineMs: number;

  constructor(deadlineMs: number) {
    super(`server did not drain within ${deadlineMs}ms`);
    this.name = 'ShutdownDeadlineError';
    this.deadlineMs = deadlineMs;
  }
}
