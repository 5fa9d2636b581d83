import { Hono } from 'hono';
import type { QueryMemoryCache } from '@qmem/core';

export function statsRoutes(cache: QueryMemoryCache) {
  const router = new Hono();

  router.get('/', async (c) => {
    return c.json(await cache.getStats());
  });

  router.post('/reset', async (c) => {
    await cache.resetStats();
    return c.body(null, 204);
  });

  return router;
}
