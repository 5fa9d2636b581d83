import {
  ValidationError,
  type EntryFeedback,
  type Rating,
} from '@qmem/shared';

const RATING_ALIASES = new Map<string, Rating>([
  ['positive', 'positive'],
  ['up', 'positive'],
  ['👍', 'positive'],
  ['negative', 'negative'],
  ['down', 'negative'],
  ['👎', 'negative'],
]);

/** Accepts positive/negative and the thumbs aliases the chat UI sends. */
export function parseRating(value: unknown): Rating {
  if (typeof value === 'string') {
    const rating = RATING_ALIASES.get(value.trim().toLowerCase());
    if (rating) return rating;
  }
  throw new ValidationError(`rating must be "positive" or "negative", got ${JSON.stringify(value)}`);
}

/** Net vote ratio in [-1, 1]; 0 when nobody has voted. */
export function derivedScore(positiveCount: number, negativeCount: number): number {
  const total = positiveCount + negativeCount;
  return total === 0 ? 0 : (positiveCount - negativeCount) / total;
}

/** Quality gate: strictly more positive than negative votes. */
export function isTrusted(feedback: Pick<EntryFeedback, 'positiveCount' | 'negativeCount'>): boolean {
  return feedback.positiveCount > feedback.negativeCount;
}

export function applyRating(feedback: EntryFeedback, rating: Rating): void {
  if (rating === 'positive') {
    feedback.positiveCount++;
  } else {
    feedback.negativeCount++;
  }
  feedback.derivedScore = derivedScore(feedback.positiveCount, feedback.negativeCount);
}
