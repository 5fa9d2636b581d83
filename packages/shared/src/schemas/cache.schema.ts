import { z } from 'zod';
import { CATEGORY_NAMES } from '../constants.js';

export const ratingSchema = z.enum(['positive', 'negative']);

export const categoryNameSchema = z.enum(CATEGORY_NAMES);

const hashListSchema = z.array(z.string());

export const queryEntrySchema = z.object({
  originalQuery: z.string(),
  normalizedQuery: z.string(),
  responseText: z.string(),
  contextInfo: z.record(z.unknown()),
  toolsUsed: z.array(z.string()),
  tokenCounts: z.object({
    input: z.number().int().min(0),
    output: z.number().int().min(0),
  }),
  timestamps: z.object({
    createdAt: z.string(),
    lastUsedAt: z.string(),
  }),
  usage: z.object({
    useCount: z.number().int().min(0),
    sessionIds: z.array(z.string()),
  }),
  feedback: z.object({
    positiveCount: z.number().int().min(0),
    negativeCount: z.number().int().min(0),
    derivedScore: z.number().min(-1).max(1),
  }),
  category: categoryNameSchema,
  tags: z.array(z.string()),
  relatedQueryHashes: hashListSchema,
});

export const feedbackEventSchema = z.object({
  hash: z.string(),
  query: z.string(),
  rating: ratingSchema,
  timestamp: z.string(),
});

export const globalStatsSchema = z.object({
  totalQueriesSeen: z.number().int().min(0),
  cacheHitCount: z.number().int().min(0),
  totalPositiveFeedback: z.number().int().min(0),
  totalNegativeFeedback: z.number().int().min(0),
});

export const cacheDocumentSchema = z.object({
  schemaVersion: z.literal('2.0'),
  metadata: z.object({
    createdAt: z.string(),
    lastUpdatedAt: z.string(),
  }),
  entries: z.record(queryEntrySchema),
  categories: z.record(hashListSchema),
  feedbackLog: z.array(feedbackEventSchema),
  globalStats: globalStatsSchema,
});

// --- Legacy (schema 1.0, no schemaVersion field) ---

const counterSchema = z.number().int().min(0);

/** Accepts both the camelCase and snake_case spellings seen in 1.0 files. */
export const legacyEntrySchema = z.object({
  query: z.string(),
  response: z.string(),
  toolsUsed: z.array(z.string()).optional(),
  tools_used: z.array(z.string()).nullable().optional(),
  timestamp: z.string().optional(),
  last_used: z.string().optional(),
  useCount: counterSchema.optional(),
  use_count: counterSchema.optional(),
  positiveFeedback: counterSchema.optional(),
  positive_feedback: counterSchema.optional(),
  negativeFeedback: counterSchema.optional(),
  negative_feedback: counterSchema.optional(),
});

export type LegacyEntry = z.infer<typeof legacyEntrySchema>;

export const legacyFeedbackSchema = z.object({
  query: z.string(),
  rating: z.string(),
  timestamp: z.string().optional(),
});

export const legacyStatsSchema = z.object({
  total_queries: counterSchema.default(0),
  cache_hits: counterSchema.default(0),
  positive_feedback: counterSchema.default(0),
  negative_feedback: counterSchema.default(0),
});

export const legacyFlatDocumentSchema = z.record(legacyEntrySchema);

export const legacyWrappedDocumentSchema = z.object({
  queries: z.record(legacyEntrySchema),
  feedback: z.array(legacyFeedbackSchema).default([]),
  stats: legacyStatsSchema.optional(),
});
