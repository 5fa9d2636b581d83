import {
  CATEGORY_NAMES,
  type CacheStats,
  type EntrySummary,
  type FeedbackEvent,
  type FeedbackSummary,
  type LookupResult,
} from '@qmem/shared';
import type { MigrationReport } from '@qmem/core';

export type OutputFormat = 'json' | 'pretty';

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}

function signed(score: number): string {
  return score >= 0 ? `+${score.toFixed(2)}` : score.toFixed(2);
}

export function formatStats(stats: CacheStats): string {
  const lines: string[] = [];
  lines.push('--- Query Memory Cache ---');
  lines.push(`Cached entries:      ${stats.cachedEntries}`);
  lines.push(`Queries seen:        ${stats.totalQueriesSeen}`);
  lines.push(`Cache hits:          ${stats.cacheHitCount} (${formatPercent(stats.cacheHitRate)})`);
  lines.push(`Feedback:            +${stats.positiveFeedback} / -${stats.negativeFeedback} (net ${stats.netFeedback})`);
  lines.push(`Learning efficiency: ${formatPercent(stats.learningEfficiency)}`);

  const categories = CATEGORY_NAMES.filter(name => stats.categoryCounts[name] > 0);
  if (categories.length > 0) {
    lines.push('');
    lines.push('Categories:');
    for (const name of categories) {
      lines.push(`  ${name.padEnd(18)} ${stats.categoryCounts[name]}`);
    }
  }

  if (stats.topQueries.length > 0) {
    lines.push('');
    lines.push('Top queries:');
    stats.topQueries.forEach((q, i) => {
      lines.push(`  ${i + 1}. ${truncate(q.query, 60)} (used ${q.useCount}x, score ${signed(q.derivedScore)})`);
    });
  }

  return lines.join('\n');
}

export function formatLookup(result: LookupResult): string {
  if (result.hit) {
    return `[HIT] ${result.hash}\n${result.responseText}`;
  }
  if (result.reason === 'not_found') {
    return `[MISS] No cached answer (${result.hash})`;
  }
  const { positiveCount, negativeCount } = result.entry.feedback;
  return `[MISS] Cached answer not trusted yet (+${positiveCount} / -${negativeCount})`;
}

export function formatFeedbackSummary(summary: FeedbackSummary): string {
  const state = summary.trusted ? 'trusted' : 'not trusted';
  return `Feedback recorded: +${summary.positiveCount} / -${summary.negativeCount}, score ${signed(summary.derivedScore)} (${state})`;
}

export function formatEntries(entries: EntrySummary[]): string {
  if (entries.length === 0) return 'No cached entries.';
  return entries
    .map(e => [
      e.trusted ? '*' : ' ',
      e.hash.slice(0, 8),
      e.category.padEnd(18),
      `${e.useCount}x`.padStart(4),
      `+${e.positiveCount}/-${e.negativeCount}`.padEnd(7),
      truncate(e.query, 60),
    ].join(' '))
    .join('\n');
}

export function formatFeedbackLog(events: FeedbackEvent[]): string {
  if (events.length === 0) return 'No feedback recorded.';
  return events
    .map(e => `${e.timestamp}  ${e.rating === 'positive' ? '+' : '-'}  ${e.query}`)
    .join('\n');
}

export function formatMigration(report: MigrationReport | null, storage: string): string {
  if (!report) return `${storage} is already at schema 2.0; nothing to migrate.`;
  const lines = [
    `Migrated ${storage} to schema 2.0`,
    `  Legacy entries:   ${report.legacyEntries}`,
    `  Entries written:  ${report.migratedEntries} (${report.mergedEntries} merged)`,
    `  Feedback events:  ${report.feedbackEvents} (${report.droppedFeedbackEvents} dropped)`,
  ];
  return lines.join('\n');
}

/** Print `value` as JSON, or through `pretty` for humans. */
export function output(format: OutputFormat, value: unknown, pretty: () => string): void {
  console.log(format === 'json' ? JSON.stringify(value, null, 2) : pretty());
}
