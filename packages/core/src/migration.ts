/**
 * Schema 1.0 → 2.0 conversion.
 *
 * 1.0 files come in two shapes: the flat `hash → entry` map, and the wrapped
 * layout `{ queries, feedback, stats }` written by the earlier chat service.
 * Both are re-keyed by the 2.0 hash (whitespace is now collapsed before
 * hashing, so two legacy keys can land on one entry; those are merged).
 */

import {
  CURRENT_SCHEMA_VERSION,
  MigrationError,
  legacyFlatDocumentSchema,
  legacyWrappedDocumentSchema,
  type CacheDocument,
  type FeedbackEvent,
  type GlobalStats,
  type QueryEntry,
  type LegacyEntry,
  type Rating,
} from '@qmem/shared';
import type { z } from 'zod';
import { normalizeQuery, hashNormalized } from './normalize.js';
import { classifyQuery, extractTags } from './classifier.js';
import { derivedScore } from './feedback.js';
import { buildCategoryIndex } from './document.js';

interface LegacyFeedback {
  query: string;
  rating: string;
  timestamp?: string;
}

export interface MigrationReport {
  legacyEntries: number;
  migratedEntries: number;
  mergedEntries: number;
  feedbackEvents: number;
  droppedFeedbackEvents: number;
}

export interface MigrationOutcome {
  document: CacheDocument;
  report: MigrationReport;
}

export function isLegacyDocument(raw: Record<string, unknown>): boolean {
  return !('schemaVersion' in raw) || raw.schemaVersion === '1.0';
}

const LEGACY_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\.(\d+))?$/;

/**
 * Convert a 1.0 timestamp ("2026-01-13 22:30:45.123456", local time) to ISO.
 * Unparseable values fall back to `fallback`.
 */
export function toIsoTimestamp(value: string | undefined, fallback: string): string {
  if (!value) return fallback;
  const match = LEGACY_TIMESTAMP.exec(value.trim());
  if (match) {
    const millis = (match[3] ?? '').padEnd(3, '0').slice(0, 3);
    const date = new Date(`${match[1]}T${match[2]}.${millis}`);
    if (!Number.isNaN(date.getTime())) return date.toISOString();
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? fallback : new Date(parsed).toISOString();
}

function legacyRating(rating: string): Rating | null {
  switch (rating.trim().toLowerCase()) {
    case 'up':
    case 'positive':
      return 'positive';
    case 'down':
    case 'negative':
      return 'negative';
    default:
      return null;
  }
}

function convertEntry(legacy: LegacyEntry, now: string): QueryEntry {
  const normalized = normalizeQuery(legacy.query);
  const positiveCount = legacy.positiveFeedback ?? legacy.positive_feedback ?? 0;
  const negativeCount = legacy.negativeFeedback ?? legacy.negative_feedback ?? 0;
  const createdAt = toIsoTimestamp(legacy.timestamp, now);

  return {
    originalQuery: legacy.query,
    normalizedQuery: normalized,
    responseText: legacy.response,
    contextInfo: {},
    toolsUsed: legacy.toolsUsed ?? legacy.tools_used ?? [],
    tokenCounts: { input: 0, output: 0 },
    timestamps: {
      createdAt,
      lastUsedAt: toIsoTimestamp(legacy.last_used, createdAt),
    },
    usage: {
      useCount: legacy.useCount ?? legacy.use_count ?? 0,
      sessionIds: [],
    },
    feedback: {
      positiveCount,
      negativeCount,
      derivedScore: derivedScore(positiveCount, negativeCount),
    },
    category: classifyQuery(normalized),
    tags: extractTags(normalized),
    relatedQueryHashes: [],
  };
}

function mergeEntries(kept: QueryEntry, other: QueryEntry): QueryEntry {
  const newer = other.timestamps.lastUsedAt > kept.timestamps.lastUsedAt ? other : kept;
  const positiveCount = kept.feedback.positiveCount + other.feedback.positiveCount;
  const negativeCount = kept.feedback.negativeCount + other.feedback.negativeCount;

  return {
    ...kept,
    responseText: newer.responseText,
    toolsUsed: newer.toolsUsed,
    timestamps: {
      createdAt: kept.timestamps.createdAt < other.timestamps.createdAt
        ? kept.timestamps.createdAt
        : other.timestamps.createdAt,
      lastUsedAt: newer.timestamps.lastUsedAt,
    },
    usage: {
      useCount: kept.usage.useCount + other.usage.useCount,
      sessionIds: [],
    },
    feedback: {
      positiveCount,
      negativeCount,
      derivedScore: derivedScore(positiveCount, negativeCount),
    },
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join(', ');
}

/** Convert a parsed 1.0 document. Throws MigrationError on any structural problem. */
export function migrateLegacyDocument(raw: Record<string, unknown>, now: string): MigrationOutcome {
  let legacyEntries: Record<string, LegacyEntry>;
  let legacyFeedback: LegacyFeedback[] = [];
  let legacyStats: { total_queries: number; cache_hits: number } | undefined;

  const body: Record<string, unknown> = { ...raw };
  delete body.schemaVersion;

  if (typeof body.queries === 'object' && body.queries !== null) {
    const parsed = legacyWrappedDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new MigrationError(`invalid 1.0 document: ${describeIssues(parsed.error)}`, parsed.error);
    }
    legacyEntries = parsed.data.queries;
    legacyFeedback = parsed.data.feedback;
    legacyStats = parsed.data.stats;
  } else {
    const parsed = legacyFlatDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new MigrationError(`invalid 1.0 document: ${describeIssues(parsed.error)}`, parsed.error);
    }
    legacyEntries = parsed.data;
  }

  const entries: Record<string, QueryEntry> = {};
  let mergedEntries = 0;

  for (const legacy of Object.values(legacyEntries)) {
    const entry = convertEntry(legacy, now);
    const hash = hashNormalized(entry.normalizedQuery);
    const existing = entries[hash];
    if (existing) {
      entries[hash] = mergeEntries(existing, entry);
      mergedEntries++;
    } else {
      entries[hash] = entry;
    }
  }

  const feedbackLog: FeedbackEvent[] = [];
  let droppedFeedbackEvents = 0;
  for (const event of legacyFeedback) {
    const rating = legacyRating(event.rating);
    if (!rating) {
      droppedFeedbackEvents++;
      continue;
    }
    feedbackLog.push({
      hash: hashNormalized(normalizeQuery(event.query)),
      query: event.query,
      rating,
      timestamp: toIsoTimestamp(event.timestamp, now),
    });
  }

  let positiveSum = 0;
  let negativeSum = 0;
  for (const entry of Object.values(entries)) {
    positiveSum += entry.feedback.positiveCount;
    negativeSum += entry.feedback.negativeCount;
  }

  // 1.0 counted agent runs and cache hits separately; both were queries seen.
  const globalStats: GlobalStats = {
    totalQueriesSeen: legacyStats ? legacyStats.total_queries + legacyStats.cache_hits : 0,
    cacheHitCount: legacyStats?.cache_hits ?? 0,
    totalPositiveFeedback: positiveSum,
    totalNegativeFeedback: negativeSum,
  };

  const document: CacheDocument = {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    metadata: { createdAt: now, lastUpdatedAt: now },
    entries,
    categories: buildCategoryIndex(entries),
    feedbackLog,
    globalStats,
  };

  return {
    document,
    report: {
      legacyEntries: Object.keys(legacyEntries).length,
      migratedEntries: Object.keys(entries).length,
      mergedEntries,
      feedbackEvents: feedbackLog.length,
      droppedFeedbackEvents,
    },
  };
}
