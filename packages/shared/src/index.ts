// ── Types ────────────────────────────────────────────────────────
export type {
  SchemaVersion,
  CategoryName,
  Rating,
  TokenCounts,
  EntryTimestamps,
  EntryUsage,
  EntryFeedback,
  QueryEntry,
  FeedbackEvent,
  GlobalStats,
  DocumentMetadata,
  CacheDocument,
  LookupResult,
  RecordOptions,
  RecordResult,
  FeedbackSummary,
  RelateOptions,
  EntryFilter,
  EntrySummary,
  TopQuery,
  CacheStats,
} from './types/cache.js';
export type {
  StorageDriver,
  LogLevel,
  StorageConfig,
  StatsConfig,
  LoggingConfig,
  ServerConfig,
  QmemConfig,
} from './types/config.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  ratingSchema,
  categoryNameSchema,
  queryEntrySchema,
  feedbackEventSchema,
  globalStatsSchema,
  cacheDocumentSchema,
  legacyEntrySchema,
  legacyFeedbackSchema,
  legacyStatsSchema,
  legacyFlatDocumentSchema,
  legacyWrappedDocumentSchema,
} from './schemas/cache.schema.js';
export type { LegacyEntry } from './schemas/cache.schema.js';
export { qmemConfigSchema } from './schemas/config.schema.js';
export {
  lookupRequestSchema,
  recordRequestSchema,
  feedbackRequestSchema,
  relateRequestSchema,
  entryListQuerySchema,
} from './schemas/api.schema.js';

// ── Constants & utils ────────────────────────────────────────────
export {
  CURRENT_SCHEMA_VERSION,
  CATEGORY_NAMES,
  CATEGORY_RULES,
  FALLBACK_CATEGORY,
  TAG_VOCABULARY,
  DEFAULT_TOP_QUERIES,
  DEFAULT_CONFIG,
} from './constants.js';
export type { CategoryRule } from './constants.js';
export * from './utils/index.js';
