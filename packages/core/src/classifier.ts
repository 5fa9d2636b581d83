import {
  CATEGORY_RULES,
  FALLBACK_CATEGORY,
  TAG_VOCABULARY,
  type CategoryName,
} from '@qmem/shared';

const prefixPatterns = new Map<string, RegExp>();
const wordPatterns = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keywords are spelled with single spaces; normalized text never holds runs.
function keywordSource(keyword: string): string {
  return escapeRegExp(keyword).replace(/ /g, '\\s+');
}

/** True when `keyword` starts a word of `text` ("delete" matches "deleted"). */
export function startsWord(text: string, keyword: string): boolean {
  let pattern = prefixPatterns.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`\\b${keywordSource(keyword)}`);
    prefixPatterns.set(keyword, pattern);
  }
  return pattern.test(text);
}

/** True when `term` appears as a whole word, optionally pluralized. */
export function containsWord(text: string, term: string): boolean {
  let pattern = wordPatterns.get(term);
  if (!pattern) {
    pattern = new RegExp(`\\b${keywordSource(term)}(?:e?s)?\\b`);
    wordPatterns.set(term, pattern);
  }
  return pattern.test(text);
}

/**
 * Assign the single category for a normalized query.
 * Rules are checked in precedence order; destructive verbs win over reads.
 */
export function classifyQuery(normalized: string): CategoryName {
  for (const rule of CATEGORY_RULES) {
    if (rule.keywords.some(keyword => startsWord(normalized, keyword))) {
      return rule.category;
    }
  }
  return FALLBACK_CATEGORY;
}

/** Every vocabulary term present in the query, in vocabulary order. */
export function extractTags(normalized: string): string[] {
  return TAG_VOCABULARY.filter(term => containsWord(normalized, term));
}

/** Lowercase, trim and dedupe caller-supplied tags. */
export function cleanTags(tags: readonly string[]): string[] {
  const cleaned = tags.map(t => t.trim().toLowerCase()).filter(t => t.length > 0);
  return [...new Set(cleaned)];
}
