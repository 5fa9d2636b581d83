import { Hono } from 'hono';
import type { QueryMemoryCache } from '@qmem/core';

export function healthRoutes(cache: QueryMemoryCache, version: string) {
  const router = new Hono();

  router.get('/', (c) => {
    return c.json({
      status: 'ok',
      version,
      storage: cache.storageDescription,
    });
  });

  return router;
}
