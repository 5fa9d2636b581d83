// ── Cache ────────────────────────────────────────────────────────
export { QueryMemoryCache } from './query-memory-cache.js';
export type { QueryMemoryCacheOptions, LookupOptions } from './query-memory-cache.js';
export { CachedAgent } from './cached-agent.js';
export type { AgentRunner, AgentAnswer, AgentRunContext, AskResult } from './cached-agent.js';

// ── Document model ───────────────────────────────────────────────
export { normalizeQuery, hashNormalized, queryHash } from './normalize.js';
export { classifyQuery, extractTags, cleanTags } from './classifier.js';
export { parseRating, derivedScore, isTrusted } from './feedback.js';
export { createEmptyDocument, serializeDocument } from './document.js';
export { decodeDocument } from './loader.js';
export type { DecodeOutcome } from './loader.js';
export { migrateLegacyDocument, isLegacyDocument, toIsoTimestamp } from './migration.js';
export type { MigrationReport, MigrationOutcome } from './migration.js';
export { computeStats } from './stats.js';
export { Mutex } from './mutex.js';

// ── Runtime ──────────────────────────────────────────────────────
export { ConfigManager, CONFIG_FILE_NAMES } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { createRuntime } from './runtime.js';
export type { QmemRuntime, RuntimeOptions } from './runtime.js';
