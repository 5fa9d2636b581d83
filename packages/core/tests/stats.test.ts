import { describe, it, expect } from 'vitest';
import type { CacheDocument, QueryEntry } from '@qmem/shared';
import { computeStats } from '../src/stats.js';
import { createEmptyDocument } from '../src/document.js';

const NOW = '2026-02-01T00:00:00.000Z';

function entry(overrides: {
  query: string;
  useCount?: number;
  positive?: number;
  negative?: number;
  lastUsedAt?: string;
  category?: QueryEntry['category'];
}): QueryEntry {
  return {
    originalQuery: overrides.query,
    normalizedQuery: overrides.query.toLowerCase(),
    responseText: 'r',
    contextInfo: {},
    toolsUsed: [],
    tokenCounts: { input: 0, output: 0 },
    timestamps: { createdAt: NOW, lastUsedAt: overrides.lastUsedAt ?? NOW },
    usage: { useCount: overrides.useCount ?? 0, sessionIds: [] },
    feedback: {
      positiveCount: overrides.positive ?? 0,
      negativeCount: overrides.negative ?? 0,
      derivedScore: 0,
    },
    category: overrides.category ?? 'general',
    tags: [],
    relatedQueryHashes: [],
  };
}

describe('computeStats', () => {
  it('reports zero rates for an empty document', () => {
    const stats = computeStats(createEmptyDocument(NOW));

    expect(stats.cachedEntries).toBe(0);
    expect(stats.cacheHitRate).toBe(0);
    expect(stats.learningEfficiency).toBe(0);
    expect(stats.topQueries).toEqual([]);
    expect(stats.categoryCounts).toEqual({
      data_deletion: 0,
      data_modification: 0,
      data_insertion: 0,
      schema_operations: 0,
      database_queries: 0,
      general: 0,
    });
  });

  it('derives rates and feedback sums', () => {
    const doc: CacheDocument = createEmptyDocument(NOW);
    doc.entries.h1 = entry({ query: 'a', positive: 3, negative: 1, category: 'database_queries' });
    doc.entries.h2 = entry({ query: 'b', positive: 0, negative: 0, category: 'database_queries' });
    doc.entries.h3 = entry({ query: 'c', positive: 0, negative: 2, category: 'data_deletion' });
    doc.globalStats.totalQueriesSeen = 8;
    doc.globalStats.cacheHitCount = 2;

    const stats = computeStats(doc);

    expect(stats.cachedEntries).toBe(3);
    expect(stats.cacheHitRate).toBe(0.25);
    expect(stats.positiveFeedback).toBe(3);
    expect(stats.negativeFeedback).toBe(3);
    expect(stats.netFeedback).toBe(0);
    expect(stats.learningEfficiency).toBe(0.5);
    expect(stats.categoryCounts.database_queries).toBe(2);
    expect(stats.categoryCounts.data_deletion).toBe(1);
  });

  it('ranks top queries by use count, then recency', () => {
    const doc = createEmptyDocument(NOW);
    doc.entries.h1 = entry({ query: 'one', useCount: 1, lastUsedAt: '2026-01-01T00:00:00.000Z' });
    doc.entries.h2 = entry({ query: 'five', useCount: 5, lastUsedAt: '2026-01-01T00:00:00.000Z' });
    doc.entries.h3 = entry({ query: 'one-later', useCount: 1, lastUsedAt: '2026-01-09T00:00:00.000Z' });

    const stats = computeStats(doc, 2);

    expect(stats.topQueries.map(q => q.query)).toEqual(['five', 'one-later']);
    expect(stats.topQueries[0]).toEqual({
      hash: 'h2',
      query: 'five',
      useCount: 5,
      lastUsedAt: '2026-01-01T00:00:00.000Z',
      derivedScore: 0,
    });
  });
});
