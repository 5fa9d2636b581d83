import {
  DEFAULT_TOP_QUERIES,
  type CacheDocument,
  type CacheStats,
  type CategoryName,
  type TopQuery,
} from '@qmem/shared';

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/** Aggregate dashboard statistics. Pure; does not touch the document. */
export function computeStats(doc: CacheDocument, topLimit = DEFAULT_TOP_QUERIES): CacheStats {
  const entries = Object.entries(doc.entries);

  let positiveFeedback = 0;
  let negativeFeedback = 0;
  const categoryCounts: Record<CategoryName, number> = {
    data_deletion: 0,
    data_modification: 0,
    data_insertion: 0,
    schema_operations: 0,
    database_queries: 0,
    general: 0,
  };

  for (const [, entry] of entries) {
    positiveFeedback += entry.feedback.positiveCount;
    negativeFeedback += entry.feedback.negativeCount;
    categoryCounts[entry.category]++;
  }

  const topQueries: TopQuery[] = entries
    .map(([hash, entry]) => ({
      hash,
      query: entry.originalQuery,
      useCount: entry.usage.useCount,
      lastUsedAt: entry.timestamps.lastUsedAt,
      derivedScore: entry.feedback.derivedScore,
    }))
    .sort((a, b) => b.useCount - a.useCount || b.lastUsedAt.localeCompare(a.lastUsedAt))
    .slice(0, topLimit);

  const { totalQueriesSeen, cacheHitCount } = doc.globalStats;

  return {
    cachedEntries: entries.length,
    totalQueriesSeen,
    cacheHitCount,
    cacheHitRate: ratio(cacheHitCount, totalQueriesSeen),
    positiveFeedback,
    negativeFeedback,
    netFeedback: positiveFeedback - negativeFeedback,
    learningEfficiency: ratio(positiveFeedback, positiveFeedback + negativeFeedback),
    categoryCounts,
    topQueries,
  };
}
