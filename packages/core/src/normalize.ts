import { createHash } from 'node:crypto';

/** Case-fold, trim and collapse internal whitespace. Idempotent. */
export function normalizeQuery(query: string): string {
  return query.toLowerCase().trim().replace(/\s+/g, ' ');
}

/** MD5 hex digest of already-normalized text. */
export function hashNormalized(normalized: string): string {
  return createHash('md5').update(normalized, 'utf8').digest('hex');
}

/** Cache key for a raw query: the hash of its normalized form. */
export function queryHash(query: string): string {
  return hashNormalized(normalizeQuery(query));
}
