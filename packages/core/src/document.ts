import {
  CATEGORY_NAMES,
  CURRENT_SCHEMA_VERSION,
  type CacheDocument,
  type QueryEntry,
} from '@qmem/shared';

export function createEmptyDocument(now: string): CacheDocument {
  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    metadata: { createdAt: now, lastUpdatedAt: now },
    entries: {},
    categories: emptyCategoryIndex(),
    feedbackLog: [],
    globalStats: {
      totalQueriesSeen: 0,
      cacheHitCount: 0,
      totalPositiveFeedback: 0,
      totalNegativeFeedback: 0,
    },
  };
}

export function emptyCategoryIndex(): Record<string, string[]> {
  const index: Record<string, string[]> = {};
  for (const name of CATEGORY_NAMES) index[name] = [];
  return index;
}

/** Rebuild the category index from the category stored on each entry. */
export function buildCategoryIndex(entries: Record<string, QueryEntry>): Record<string, string[]> {
  const index = emptyCategoryIndex();
  for (const [hash, entry] of Object.entries(entries)) {
    index[entry.category].push(hash);
  }
  return index;
}

export function addToCategory(doc: CacheDocument, hash: string, entry: QueryEntry): void {
  const bucket = doc.categories[entry.category] ?? [];
  if (!bucket.includes(hash)) bucket.push(hash);
  doc.categories[entry.category] = bucket;
}

export function serializeDocument(doc: CacheDocument): string {
  return JSON.stringify(doc, null, 2);
}

/** Adds `value` unless already present, keeping insertion order. */
export function addUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
