import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
  checks: z.object({
    database: z.enum(['up', 'down']),
    cache: z.enum(['up', 'down']),
  }),
});

describe('GET /health', () => {
  it('returns ok when database and cache both answer', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health', headers: { 'x-request-id': 'health-1' } });

      expect(res.statusCode).toBe(200);

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed).toEqual({
        ok: true,
        env: 'test',
        service: 'web-scaffold-test',
        requestId: 'health-1',
        checks: { database: 'up', cache: 'up' },
      });
    } finally {
      await close();
    }
  });

  it('returns 503 and marks the failing store down', async () => {
    const { app, deps, close } = await buildTestApp();
    vi.spyOn(deps.cache, 'ping').mockRejectedValue(new Error('redis down'));

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.ok).toBe(false);
      expect(parsed.checks).toEqual({ database: 'up', cache: 'down' });
    } finally {
      await close();
    }
  });
});
