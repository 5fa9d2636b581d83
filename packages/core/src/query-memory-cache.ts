/**
 * QueryMemoryCache — feedback-gated answer cache for the agent service.
 *
 * A stored answer is served only while its positive votes strictly outnumber
 * its negative ones. Everything lives in one document that is rewritten in
 * full on every mutation; a single mutex serializes operations so concurrent
 * sessions never lose each other's increments.
 */

import {
  MigrationError,
  NotFoundError,
  ValidationError,
  isoNow,
  systemClock,
  type CacheDocument,
  type CacheStats,
  type Clock,
  type EntryFilter,
  type EntrySummary,
  type FeedbackEvent,
  type FeedbackSummary,
  type LookupResult,
  type QueryEntry,
  type RecordOptions,
  type RecordResult,
  type RelateOptions,
} from '@qmem/shared';
import type { CacheStorage } from '@qmem/store';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { Mutex } from './mutex.js';
import { normalizeQuery, hashNormalized } from './normalize.js';
import { classifyQuery, extractTags, cleanTags } from './classifier.js';
import { applyRating, isTrusted, parseRating } from './feedback.js';
import { addToCategory, addUnique, createEmptyDocument, serializeDocument } from './document.js';
import { decodeDocument } from './loader.js';
import type { MigrationReport } from './migration.js';
import { computeStats } from './stats.js';

export interface QueryMemoryCacheOptions {
  logger?: Logger;
  clock?: Clock;
  /** Length of the top-queries list in getStats(). Defaults to 5. */
  topQueriesLimit?: number;
}

export interface LookupOptions {
  sessionId?: string;
}

export class QueryMemoryCache {
  private doc: CacheDocument | null = null;
  private migration: MigrationReport | null = null;
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly topQueriesLimit?: number;

  constructor(
    private readonly storage: CacheStorage,
    options: QueryMemoryCacheOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? systemClock;
    this.topQueriesLimit = options.topQueriesLimit;
  }

  get storageDescription(): string {
    return this.storage.description;
  }

  // ======================================================================
  // Initialization & Persistence
  // ======================================================================

  /**
   * Load the document, migrating a 1.0 file in place. Resolves with the
   * migration report when this instance converted a legacy document.
   * Rejects with MigrationError when a legacy document cannot be converted;
   * every later operation retries the load and fails the same way.
   */
  async init(): Promise<MigrationReport | null> {
    return this.mutex.runExclusive(async () => {
      await this.ensureLoaded();
      return this.migration;
    });
  }

  private now(): string {
    return isoNow(this.clock);
  }

  private async ensureLoaded(): Promise<CacheDocument> {
    if (this.doc) return this.doc;

    let raw: string | null;
    try {
      raw = await this.storage.read();
    } catch (err) {
      this.logger.warn({ err, storage: this.storage.description }, 'cache unreadable, starting empty');
      this.doc = createEmptyDocument(this.now());
      return this.doc;
    }

    if (raw === null) {
      this.doc = createEmptyDocument(this.now());
      return this.doc;
    }

    const outcome = decodeDocument(raw, this.storage.description, this.now());

    if (outcome.kind === 'unreadable') {
      this.logger.warn({ err: outcome.error, storage: this.storage.description }, 'cache document invalid, starting empty');
      this.doc = createEmptyDocument(this.now());
      return this.doc;
    }

    if (outcome.kind === 'migrated') {
      // The legacy file is replaced before the cache becomes usable.
      await this.write(outcome.document).catch((err: unknown) => {
        throw new MigrationError('could not persist migrated document', err);
      });
      this.logger.info({ ...outcome.report, storage: this.storage.description }, 'migrated cache document 1.0 -> 2.0');
      this.migration = outcome.report;
    }

    this.doc = outcome.document;
    return this.doc;
  }

  private async write(doc: CacheDocument): Promise<void> {
    doc.metadata.lastUpdatedAt = this.now();
    await this.storage.write(serializeDocument(doc));
  }

  /**
   * Apply `fn` to a copy of the document and persist it; the copy replaces the
   * live document only once the write succeeded, so a failed write leaves the
   * cache exactly as it was.
   */
  private async commit<T>(fn: (draft: CacheDocument) => T): Promise<T> {
    const current = await this.ensureLoaded();
    const draft = structuredClone(current);
    const result = fn(draft);
    await this.write(draft);
    this.doc = draft;
    return result;
  }

  /** Lookups keep their counters even when the write fails; the next write carries them. */
  private async persistLookup(doc: CacheDocument, hash: string): Promise<void> {
    try {
      await this.write(doc);
    } catch (err) {
      this.logger.warn({ err, hash }, 'failed to persist lookup counters');
    }
  }

  private resolve(query: string): { normalized: string; hash: string } {
    const normalized = normalizeQuery(query);
    if (normalized.length === 0) throw new ValidationError('query must not be empty');
    return { normalized, hash: hashNormalized(normalized) };
  }

  // ======================================================================
  // Core operations
  // ======================================================================

  async lookup(query: string, options: LookupOptions = {}): Promise<LookupResult> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.ensureLoaded();
      const { hash } = this.resolve(query);
      const entry = doc.entries[hash];

      doc.globalStats.totalQueriesSeen++;

      if (!entry) {
        await this.persistLookup(doc, hash);
        this.logger.debug({ hash }, 'cache miss');
        return { hit: false, reason: 'not_found', hash };
      }

      if (!isTrusted(entry.feedback)) {
        await this.persistLookup(doc, hash);
        this.logger.debug({ hash, feedback: entry.feedback }, 'cache entry not trusted');
        return { hit: false, reason: 'untrusted', hash, entry: structuredClone(entry) };
      }

      entry.usage.useCount++;
      entry.timestamps.lastUsedAt = this.now();
      if (options.sessionId) addUnique(entry.usage.sessionIds, options.sessionId);
      doc.globalStats.cacheHitCount++;
      await this.persistLookup(doc, hash);

      this.logger.debug({ hash, useCount: entry.usage.useCount }, 'cache hit');
      return { hit: true, hash, responseText: entry.responseText, entry: structuredClone(entry) };
    });
  }

  /**
   * Store (or overwrite) the answer for a query. Feedback, category, tags and
   * usage of an existing entry are kept. Rejects with StorageIOError when the
   * document cannot be written.
   */
  async record(
    query: string,
    response: string,
    toolsUsed: readonly string[] = [],
    options: RecordOptions = {},
  ): Promise<RecordResult> {
    return this.mutex.runExclusive(() =>
      this.commit((doc) => {
        const { normalized, hash } = this.resolve(query);
        const now = this.now();
        const existing = doc.entries[hash];

        if (existing) {
          existing.responseText = response;
          existing.contextInfo = { ...options.context };
          existing.toolsUsed = [...toolsUsed];
          if (options.tokenCounts) existing.tokenCounts = { ...options.tokenCounts };
          existing.timestamps.lastUsedAt = now;
          this.logger.debug({ hash }, 'cache entry updated');
          return { hash, created: false };
        }

        const entry: QueryEntry = {
          originalQuery: query,
          normalizedQuery: normalized,
          responseText: response,
          contextInfo: { ...options.context },
          toolsUsed: [...toolsUsed],
          tokenCounts: options.tokenCounts ? { ...options.tokenCounts } : { input: 0, output: 0 },
          timestamps: { createdAt: now, lastUsedAt: now },
          usage: { useCount: 0, sessionIds: [] },
          feedback: { positiveCount: 0, negativeCount: 0, derivedScore: 0 },
          category: classifyQuery(normalized),
          tags: extractTags(normalized),
          relatedQueryHashes: [],
        };
        doc.entries[hash] = entry;
        addToCategory(doc, hash, entry);

        this.logger.debug({ hash, category: entry.category, tags: entry.tags }, 'cache entry created');
        return { hash, created: true };
      }),
    );
  }

  /**
   * Register a thumbs-up or thumbs-down for the cached answer of `query`.
   * Accepts "positive"/"negative" and the aliases "up"/"down".
   * Rejects with ValidationError for any other rating and NotFoundError when
   * the query has no entry.
   */
  async feedback(query: string, rating: string): Promise<FeedbackSummary> {
    const parsed = parseRating(rating);

    return this.mutex.runExclusive(() =>
      this.commit((doc) => {
        const { hash } = this.resolve(query);
        const entry = doc.entries[hash];
        if (!entry) throw new NotFoundError(query, hash);

        applyRating(entry.feedback, parsed);
        doc.feedbackLog.push({ hash, query, rating: parsed, timestamp: this.now() });
        if (parsed === 'positive') {
          doc.globalStats.totalPositiveFeedback++;
        } else {
          doc.globalStats.totalNegativeFeedback++;
        }

        this.logger.debug({ hash, rating: parsed, feedback: entry.feedback }, 'feedback recorded');
        return {
          hash,
          positiveCount: entry.feedback.positiveCount,
          negativeCount: entry.feedback.negativeCount,
          derivedScore: entry.feedback.derivedScore,
          trusted: isTrusted(entry.feedback),
        };
      }),
    );
  }

  /** Cross-link two cached queries and optionally tag both. */
  async relate(query: string, relatedQuery: string, options: RelateOptions = {}): Promise<void> {
    await this.mutex.runExclusive(() =>
      this.commit((doc) => {
        const a = this.resolve(query);
        const b = this.resolve(relatedQuery);
        const entryA = doc.entries[a.hash];
        const entryB = doc.entries[b.hash];
        if (!entryA) throw new NotFoundError(query, a.hash);
        if (!entryB) throw new NotFoundError(relatedQuery, b.hash);

        if (a.hash !== b.hash) {
          addUnique(entryA.relatedQueryHashes, b.hash);
          addUnique(entryB.relatedQueryHashes, a.hash);
        }
        for (const tag of cleanTags(options.tags ?? [])) {
          addUnique(entryA.tags, tag);
          addUnique(entryB.tags, tag);
        }
      }),
    );
  }

  // ======================================================================
  // Read side
  // ======================================================================

  async getStats(): Promise<CacheStats> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.ensureLoaded();
      return computeStats(doc, this.topQueriesLimit);
    });
  }

  /** The entry for `query`, without touching any counter. */
  async getEntry(query: string): Promise<QueryEntry | undefined> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.ensureLoaded();
      const entry = doc.entries[this.resolve(query).hash];
      return entry ? structuredClone(entry) : undefined;
    });
  }

  async listEntries(filter: EntryFilter = {}): Promise<EntrySummary[]> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.ensureLoaded();
      return Object.entries(doc.entries)
        .filter(([, e]) => !filter.category || e.category === filter.category)
        .filter(([, e]) => !filter.tag || e.tags.includes(filter.tag))
        .filter(([, e]) => !filter.trustedOnly || isTrusted(e.feedback))
        .map(([hash, e]) => ({
          hash,
          query: e.originalQuery,
          category: e.category,
          tags: [...e.tags],
          useCount: e.usage.useCount,
          positiveCount: e.feedback.positiveCount,
          negativeCount: e.feedback.negativeCount,
          derivedScore: e.feedback.derivedScore,
          trusted: isTrusted(e.feedback),
          lastUsedAt: e.timestamps.lastUsedAt,
        }))
        .sort((x, y) => y.lastUsedAt.localeCompare(x.lastUsedAt));
    });
  }

  /** Most recent feedback events, oldest first. */
  async getFeedbackLog(limit?: number): Promise<FeedbackEvent[]> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.ensureLoaded();
      if (limit !== undefined && limit <= 0) return [];
      const events = limit === undefined ? doc.feedbackLog : doc.feedbackLog.slice(-limit);
      return structuredClone(events);
    });
  }

  // ======================================================================
  // Maintenance
  // ======================================================================

  /** Zero the global counters. Entries and the feedback log are kept. */
  async resetStats(): Promise<void> {
    await this.mutex.runExclusive(() =>
      this.commit((doc) => {
        doc.globalStats = {
          totalQueriesSeen: 0,
          cacheHitCount: 0,
          totalPositiveFeedback: 0,
          totalNegativeFeedback: 0,
        };
      }),
    );
    this.logger.info('cache statistics reset');
  }
}
