import { z } from 'zod';
import { categoryNameSchema } from './cache.schema.js';

const querySchema = z.string().min(1).max(10_000);

export const lookupRequestSchema = z.object({
  query: querySchema,
  sessionId: z.string().min(1).optional(),
});

export const recordRequestSchema = z.object({
  query: querySchema,
  response: z.string(),
  toolsUsed: z.array(z.string()).default([]),
  context: z.record(z.unknown()).optional(),
  tokenCounts: z.object({
    input: z.number().int().min(0),
    output: z.number().int().min(0),
  }).optional(),
});

// rating stays a plain string here so the cache reports a ValidationError
export const feedbackRequestSchema = z.object({
  query: querySchema,
  rating: z.string(),
});

export const relateRequestSchema = z.object({
  query: querySchema,
  relatedQuery: querySchema,
  tags: z.array(z.string().min(1)).optional(),
});

export const entryListQuerySchema = z.object({
  category: categoryNameSchema.optional(),
  tag: z.string().min(1).optional(),
  trusted: z.enum(['true', 'false']).optional(),
});
