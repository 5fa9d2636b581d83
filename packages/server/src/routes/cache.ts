import { Hono } from 'hono';
import {
  lookupRequestSchema,
  recordRequestSchema,
  feedbackRequestSchema,
  relateRequestSchema,
  entryListQuerySchema,
} from '@qmem/shared';
import type { QueryMemoryCache } from '@qmem/core';

export function cacheRoutes(cache: QueryMemoryCache) {
  const router = new Hono();

  router.post('/lookup', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = lookupRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', issues: parsed.error.issues }, 400);
    }

    const result = await cache.lookup(parsed.data.query, { sessionId: parsed.data.sessionId });
    return c.json(result);
  });

  router.post('/record', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = recordRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', issues: parsed.error.issues }, 400);
    }

    const { query, response, toolsUsed, context, tokenCounts } = parsed.data;
    const result = await cache.record(query, response, toolsUsed, { context, tokenCounts });
    return c.json(result, result.created ? 201 : 200);
  });

  router.post('/feedback', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = feedbackRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', issues: parsed.error.issues }, 400);
    }

    return c.json(await cache.feedback(parsed.data.query, parsed.data.rating));
  });

  router.post('/relate', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = relateRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', issues: parsed.error.issues }, 400);
    }

    await cache.relate(parsed.data.query, parsed.data.relatedQuery, { tags: parsed.data.tags });
    return c.json({ ok: true });
  });

  router.get('/entries', async (c) => {
    const parsed = entryListQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', issues: parsed.error.issues }, 400);
    }

    const { category, tag, trusted } = parsed.data;
    return c.json(await cache.listEntries({ category, tag, trustedOnly: trusted === 'true' }));
  });

  router.get('/feedback', async (c) => {
    const raw = c.req.query('limit');
    const limit = raw === undefined ? undefined : Number(raw);
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      return c.json({ error: 'limit must be a non-negative integer' }, 400);
    }

    return c.json(await cache.getFeedbackLog(limit));
  });

  return router;
}
