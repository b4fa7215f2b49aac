// tests/api.spec.ts
// HTTP API against the app listening on an ephemeral local port.

import type { Server } from 'http';
import { test, expect } from '@playwright/test';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { RateLimiter } from '../src/middleware';
import { loadDefaultCatalog } from '../src/services/ingredientCatalog';

const catalog = loadDefaultCatalog();
const profile = { weightKg: 10, lifeStage: 'adult', activity: 'moderate' };
const pantry = [
  'turkey-lean',
  'chicken-lean',
  'white-rice',
  'sweet-potato',
  'olive-oil',
  'fish-oil',
  'carrot',
  'green-beans',
  'eggshell-powder',
];

async function listen(app: Express): Promise<{ server: Server; baseURL: string }> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server did not bind to a TCP port');
  }
  return { server, baseURL: `http://127.0.0.1:${address.port}` };
}

async function close(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

test.describe('HTTP API', () => {
  let server: Server;
  let baseURL: string;
  const limiter = new RateLimiter();

  test.beforeAll(async () => {
    ({ server, baseURL } = await listen(
      createApp({ catalog, limiter, requestLogging: false, rateLimit: { windowMs: 60000, maxRequests: 100 } })
    ));
  });

  test.afterAll(async () => {
    await close(server);
    limiter.destroy();
  });

  test('GET /health', async ({ request }) => {
    const res = await request.get(`${baseURL}/health`);
    expect(res.status()).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  test('GET /api/v1/ingredients filters and sorts', async ({ request }) => {
    const res = await request.get(`${baseURL}/api/v1/ingredients?category=fat&sort=name`);
    expect(res.status()).toBe(200);
    const body = await res.json();
    expect(body.ok).toBe(true);
    expect(body.data.count).toBe(4);
    expect(body.data.ingredients.map((i: { name: string }) => i.name)).toEqual([
      'Fish oil',
      'Flaxseed oil',
      'MCT oil',
      'Olive oil',
    ]);
  });

  test('GET /api/v1/ingredients rejects an unknown category', async ({ request }) => {
    const res = await request.get(`${baseURL}/api/v1/ingredients?category=cake`);
    expect(res.status()).toBe(400);
    const body = await res.json();
    expect(body.ok).toBe(false);
    expect(body.meta.code).toBe('VALIDATION_FAILED');
  });

  test('GET /api/v1/ingredients/:id', async ({ request }) => {
    const found = await request.get(`${baseURL}/api/v1/ingredients/turkey-lean`);
    expect(found.status()).toBe(200);
    expect((await found.json()).data.per100g.protein).toBe(29);

    const missing = await request.get(`${baseURL}/api/v1/ingredients/chocolate`);
    expect(missing.status()).toBe(404);
    expect((await missing.json()).meta).toEqual({ code: 'INGREDIENT_NOT_FOUND', ingredientId: 'chocolate' });
  });

  test('GET /api/v1/ratios/presets', async ({ request }) => {
    const body = await (await request.get(`${baseURL}/api/v1/ratios/presets`)).json();
    expect(body.data).toHaveLength(6);
    expect(body.data[0]).toMatchObject({ key: 'balanced', proteinPct: 40, fatPct: 35, carbPct: 25 });
  });

  test('POST /api/v1/ratios/targets', async ({ request }) => {
    const res = await request.post(`${baseURL}/api/v1/ratios/targets`, {
      data: { profile, ratio: { custom: { proteinPct: 40, fatPct: 30, carbPct: 20 } } },
    });
    expect(res.status()).toBe(400);
    expect((await res.json()).meta.code).toBe('RATIO_SPEC_INVALID');

    const ok = await request.post(`${baseURL}/api/v1/ratios/targets`, { data: { profile } });
    expect(ok.status()).toBe(200);
    const body = await ok.json();
    expect(body.data.ratio.key).toBe('balanced');
    expect(body.data.targets.protein.kcal).toBeCloseTo(251.9, 1);
  });

  test('GET /api/v1/supplements', async ({ request }) => {
    const all = await (await request.get(`${baseURL}/api/v1/supplements`)).json();
    expect(all.data.count).toBe(11);
    expect(all.data.focus).toEqual([]);

    const puppy = await (await request.get(`${baseURL}/api/v1/supplements?focus=puppy_growth`)).json();
    expect(puppy.data.supplements.map((s: { id: string }) => s.id)).toEqual(['calcium-support', 'multivitamin']);

    const bad = await request.get(`${baseURL}/api/v1/supplements?focus=cake`);
    expect(bad.status()).toBe(400);
    expect((await bad.json()).meta.code).toBe('VALIDATION_FAILED');
  });

  test('POST /api/v1/energy', async ({ request }) => {
    const res = await request.post(`${baseURL}/api/v1/energy`, { data: profile });
    expect(res.status()).toBe(200);
    const body = await res.json();
    expect(body.data.rer).toBeCloseTo(393.64, 2);
    expect(body.data.mer).toBeCloseTo(629.82, 2);

    const bad = await request.post(`${baseURL}/api/v1/energy`, { data: { ...profile, weightKg: -1 } });
    expect(bad.status()).toBe(400);
    expect((await bad.json()).meta.issues).toEqual(['weightKg: weightKg must be positive']);
  });

  test('POST /api/v1/plans returns a week of portions', async ({ request }) => {
    const res = await request.post(`${baseURL}/api/v1/plans`, { data: { profile, pantry } });
    expect(res.status()).toBe(201);
    const body = await res.json();

    expect(body.data.planId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(body.data.days).toHaveLength(7);
    expect(body.data.days[0].portions[0]).toEqual({
      ingredientId: 'turkey-lean',
      name: 'Turkey (lean, cooked)',
      role: 'protein',
      grams: 202.6,
    });
    expect(body.data.days[0].totals.caPRatio).toBe(1.52);
    expect(Object.keys(body.data.report.issues)).toEqual(['MISSING_MICRONUTRIENT_SOURCE:organ']);
    expect(res.headers()['x-ratelimit-limit']).toBe('100');
  });

  test('POST /api/v1/plans without a protein source', async ({ request }) => {
    const res = await request.post(`${baseURL}/api/v1/plans`, {
      data: { profile, pantry: ['olive-oil', 'white-rice'] },
    });
    expect(res.status()).toBe(422);
    expect((await res.json()).meta).toEqual({ code: 'INSUFFICIENT_CANDIDATES', role: 'protein' });
  });

  test('POST /api/v1/plans/validate', async ({ request }) => {
    const res = await request.post(`${baseURL}/api/v1/plans/validate`, {
      data: {
        profile,
        days: [
          [
            { ingredientId: 'turkey-lean', grams: -10 },
            { ingredientId: 'white-rice', grams: 100 },
          ],
        ],
      },
    });
    expect(res.status()).toBe(200);
    const body = await res.json();
    expect(body.data.report.highestSeverity).toBe('critical');
    expect(body.data.report.issues['INVALID_QUANTITY:day-1'].severity).toBe('critical');
  });

  test('malformed JSON and unknown routes', async ({ request }) => {
    const malformed = await request.post(`${baseURL}/api/v1/energy`, {
      data: '{"weightKg":',
      headers: { 'Content-Type': 'application/json' },
    });
    expect(malformed.status()).toBe(400);

    const missing = await request.get(`${baseURL}/api/v1/kibble`);
    expect(missing.status()).toBe(404);
    expect((await missing.json()).error).toBe('No route for GET /api/v1/kibble');
  });
});

test.describe('Plan rate limiting', () => {
  test('answers 429 once the window is used up', async ({ request }) => {
    const { server, baseURL } = await listen(
      createApp({ catalog, requestLogging: false, rateLimit: { windowMs: 60000, maxRequests: 1 } })
    );
    try {
      const first = await request.post(`${baseURL}/api/v1/plans`, { data: { profile, pantry } });
      expect(first.status()).toBe(201);

      const second = await request.post(`${baseURL}/api/v1/plans`, { data: { profile, pantry } });
      expect(second.status()).toBe(429);
      expect((await second.json()).meta.code).toBe('RATE_LIMITED');
    } finally {
      await close(server);
    }
  });
});
