import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { buildServer } from '../../../../src/app/server';
import type { AppDeps } from '../../../../src/app/di';
import { AppError } from '../../../../src/shared/http/errors';
import { buildTestDeps, capturingLogger, testConfig } from '../../../helpers/build-test-app';
import type { LogEntry } from '../../../helpers/build-test-app';

let app: FastifyInstance;
let deps: AppDeps;
let entries: LogEntry[];

beforeEach(async () => {
  const captured = capturingLogger();
  entries = captured.entries;

  const config = testConfig();
  deps = await buildTestDeps(config, captured.logger);
  app = await buildServer({ config, deps });

  app.get('/conflict', () => {
    throw AppError.validationError('name is taken', { name: 'demo' });
  });
  app.get('/boom', () => {
    throw new Error('kaboom');
  });
  app.post(
    '/items',
    {
      schema: {
        body: {
          type: 'object',
          required: ['name'],
          properties: { name: { type: 'string' } },
        },
      },
    },
    () => ({ ok: true }),
  );
});

afterEach(async () => {
  await app.close();
  await deps.close();
});

describe('error handler', () => {
  it('maps unknown routes to 404 NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/missing' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Route GET /missing not found' },
    });
  });

  it('maps AppError to its status and code', async () => {
    const res = await app.inject({ method: 'GET', url: '/conflict' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'name is taken' } });
  });

  it('hides unexpected errors behind a generic 500 and logs the stack', async () => {
    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error' } });

    await vi.waitFor(() => {
      const logged = entries.find((e) => e.message === 'unhandled_error');
      expect(logged).toMatchObject({ level: 'error', error: 'kaboom', flow: 'http.error' });
      expect(typeof logged?.stack).toBe('string');
    });
  });

  it('maps schema validation failures to 400 VALIDATION_ERROR', async () => {
    const res = await app.inject({ method: 'POST', url: '/items', payload: {} });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('keeps the status of framework client errors', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/items',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: { code: 'BAD_REQUEST' } });
  });
});

describe('request context', () => {
  it('echoes an incoming x-request-id', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/missing',
      headers: { 'x-request-id': 'req-123' },
    });

    expect(res.headers['x-request-id']).toBe('req-123');
  });

  it('generates a request id when none is sent', async () => {
    const res = await app.inject({ method: 'GET', url: '/missing' });

    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('logs one request line per response with status and path', async () => {
    await app.inject({ method: 'GET', url: '/missing?x=1', headers: { 'x-request-id': 'req-456' } });

    await vi.waitFor(() => {
      const line = entries.find((e) => e.message === 'request');
      expect(line).toMatchObject({
        level: 'info',
        requestId: 'req-456',
        method: 'GET',
        status: 404,
        path: '/missing',
        query: 'x=1',
      });
    });
  });
});
