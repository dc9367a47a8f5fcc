import { describe, it, expect } from 'vitest';
import { ShutdownDeadlineError, StartupError } from '../../../src/app/lifecycle-errors';

describe('StartupError', () => {
  it('tags the failing stage and keeps the cause', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:6379');

    const err: unknown = await StartupError.wrap('cache', () => Promise.reject(cause)).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(StartupError);
    const e = err as StartupError;
    expect(e.stage).toBe('cache');
    expect(e.message).toBe('cache init failed: connect ECONNREFUSED 127.0.0.1:6379');
    expect(e.cause).toBe(cause);
  });

  it('passes an existing StartupError through unchanged', async () => {
    const inner = new StartupError('cache', new Error('boom'));

    await expect(StartupError.wrap('database', () => Promise.reject(inner))).rejects.toBe(inner);
  });

  it('returns the value when nothing fails', async () => {
    await expect(StartupError.wrap('listen', () => Promise.resolve(42))).resolves.toBe(42);
    expect(StartupError.wrapSync('config', () => 'ok')).toBe('ok');
  });

  it('wrapSync tags synchronous throws, including non-Error values', () => {
    expect(() =>
      StartupError.wrapSync('config', () => {
        throw 'bad env';
      }),
    ).toThrowError('config init failed: bad env');
  });
});

describe('ShutdownDeadlineError', () => {
  it('reports the deadline', () => {
    const err = new ShutdownDeadlineError(5000);

    expect(err.deadlineMs).toBe(5000);
    expect(err.message).toBe('server did not drain within 5000ms');
    expect(err.name).toBe('ShutdownDeadlineError');
  });
});
