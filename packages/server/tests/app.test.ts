import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DEFAULT_CONFIG, MigrationError } from '@qmem/shared';
import { MemoryStorage } from '@qmem/store';
import { QueryMemoryCache, queryHash, silentLogger, type QmemRuntime } from '@qmem/core';
import { createApp, startServer } from '../src/app.js';

function post(path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

describe('qmem server', () => {
  let cache: QueryMemoryCache;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    cache = new QueryMemoryCache(new MemoryStorage());
    app = createApp(cache, { version: '1.2.3' });
  });

  it('reports health', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '1.2.3', storage: 'memory' });
  });

  it('records, rates and serves an answer', async () => {
    const recorded = await app.request(post('/cache/record', {
      query: 'List tables',
      response: 'users, orders',
      toolsUsed: ['query'],
    }));
    expect(recorded.status).toBe(201);
    expect(await recorded.json()).toEqual({ hash: queryHash('list tables'), created: true });

    const gated = await app.request(post('/cache/lookup', { query: 'list   TABLES' }));
    expect(await gated.json()).toMatchObject({ hit: false, reason: 'untrusted' });

    const rated = await app.request(post('/cache/feedback', { query: 'List tables', rating: 'up' }));
    expect(rated.status).toBe(200);
    expect(await rated.json()).toMatchObject({ positiveCount: 1, trusted: true });

    const hit = await app.request(post('/cache/lookup', { query: 'list tables', sessionId: 'web-1' }));
    expect(await hit.json()).toMatchObject({ hit: true, responseText: 'users, orders' });
  });

  it('returns 200 when overwriting an entry', async () => {
    await app.request(post('/cache/record', { query: 'q', response: 'a' }));
    const res = await app.request(post('/cache/record', { query: 'q', response: 'b' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ hash: queryHash('q'), created: false });
  });

  it('rejects invalid bodies with 400', async () => {
    const missing = await app.request(post('/cache/lookup', { sessionId: 'x' }));
    expect(missing.status).toBe(400);

    const notJson = await app.request(new Request('http://localhost/cache/record', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{oops',
    }));
    expect(notJson.status).toBe(400);
  });

  it('maps a bad rating to 400 and an unknown query to 404', async () => {
    await cache.record('q', 'a');

    const badRating = await app.request(post('/cache/feedback', { query: 'q', rating: 'sideways' }));
    expect(badRating.status).toBe(400);
    expect(await badRating.json()).toEqual({
      error: 'Validation failed: rating must be "positive" or "negative", got "sideways"',
    });

    const unknown = await app.request(post('/cache/feedback', { query: 'never seen', rating: 'up' }));
    expect(unknown.status).toBe(404);
  });

  it('relates entries and lists them by tag', async () => {
    await cache.record('list users', '1');
    await cache.record('count users', '2');

    const related = await app.request(post('/cache/relate', {
      query: 'list users',
      relatedQuery: 'count users',
      tags: ['reporting'],
    }));
    expect(related.status).toBe(200);

    const res = await app.request('/cache/entries?tag=reporting');
    const entries: unknown = await res.json();
    expect(Array.isArray(entries) && entries.length).toBe(2);
  });

  it('filters entries by category and trust', async () => {
    await cache.record('drop table users', 'ok');
    await cache.record('select users', 'alice');
    await cache.feedback('select users', 'positive');

    const deletions = await app.request('/cache/entries?category=data_deletion');
    expect(await deletions.json()).toMatchObject([{ query: 'drop table users' }]);

    const trusted = await app.request('/cache/entries?trusted=true');
    expect(await trusted.json()).toMatchObject([{ query: 'select users', trusted: true }]);

    const invalid = await app.request('/cache/entries?category=everything');
    expect(invalid.status).toBe(400);
  });

  it('returns the feedback log tail', async () => {
    await cache.record('q', 'a');
    await cache.feedback('q', 'positive');
    await cache.feedback('q', 'negative');

    const res = await app.request('/cache/feedback?limit=1');
    expect(await res.json()).toMatchObject([{ rating: 'negative', query: 'q' }]);

    const bad = await app.request('/cache/feedback?limit=-2');
    expect(bad.status).toBe(400);
  });

  it('serves and resets statistics', async () => {
    await cache.record('q', 'a');
    await cache.lookup('q');

    const stats = await app.request('/stats');
    expect(await stats.json()).toMatchObject({ cachedEntries: 1, totalQueriesSeen: 1, cacheHitCount: 0 });

    const reset = await app.request(post('/stats/reset', {}));
    expect(reset.status).toBe(204);
    expect((await cache.getStats()).totalQueriesSeen).toBe(0);
  });

  describe('with an API key', () => {
    beforeEach(() => {
      app = createApp(cache, { apiKey: 'test-secret' });
    });

    it('requires the bearer token on cache routes', async () => {
      const denied = await app.request(post('/cache/lookup', { query: 'q' }));
      expect(denied.status).toBe(401);

      const allowed = await app.request(post('/cache/lookup', { query: 'q' }, { Authorization: 'Bearer test-secret' }));
      expect(allowed.status).toBe(200);
    });

    it('protects statistics but not health', async () => {
      expect((await app.request('/stats')).status).toBe(401);
      expect((await app.request('/health')).status).toBe(200);
    });
  });

  describe('with CORS origins', () => {
    beforeEach(() => {
      app = createApp(cache, { corsOrigins: ['http://localhost:5173'] });
    });

    it('answers a preflight from an allowed origin', async () => {
      const res = await app.request('/cache/lookup', {
        method: 'OPTIONS',
        headers: {
          Origin: 'http://localhost:5173',
          'Access-Control-Request-Method': 'POST',
        },
      });

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET,POST');
    });

    it('sends no allow-origin header to other origins', async () => {
      const res = await app.request('/health', { headers: { Origin: 'http://elsewhere.test' } });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBeNull();
    });

    it('sends no CORS headers when no origins are configured', async () => {
      const plain = createApp(cache);
      const res = await plain.request('/health', { headers: { Origin: 'http://localhost:5173' } });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBeNull();
    });
  });
});

describe('startServer', () => {
  it('closes the runtime when the cache cannot be loaded', async () => {
    const storage = new MemoryStorage('{"schemaVersion":"9.9"}');
    const close = vi.fn();
    const runtime: QmemRuntime = {
      config: DEFAULT_CONFIG,
      logger: silentLogger(),
      storage,
      cache: new QueryMemoryCache(storage),
      close,
    };

    await expect(startServer(runtime, '1.2.3')).rejects.toThrow(MigrationError);
    expect(close).toHaveBeenCalledOnce();
  });
});
