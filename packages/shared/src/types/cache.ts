// ============================================================================
// Query Memory Cache — persisted document model
// One JSON document holds every cached answer, its feedback history and the
// running counters. Hashes are MD5 digests of the normalized query text.
// ============================================================================

export type SchemaVersion = '1.0' | '2.0';

export type CategoryName =
  | 'data_deletion'
  | 'data_modification'
  | 'data_insertion'
  | 'schema_operations'
  | 'database_queries'
  | 'general';

export type Rating = 'positive' | 'negative';

// --- Entry ---

export interface TokenCounts {
  input: number;
  output: number;
}

export interface EntryTimestamps {
  createdAt: string;
  lastUsedAt: string;
}

export interface EntryUsage {
  useCount: number;
  sessionIds: string[]; // set semantics, insertion order
}

export interface EntryFeedback {
  positiveCount: number;
  negativeCount: number;
  derivedScore: number; // (p - n) / (p + n), 0 when no votes
}

export interface QueryEntry {
  originalQuery: string;
  normalizedQuery: string;
  responseText: string;
  contextInfo: Record<string, unknown>;
  toolsUsed: string[];
  tokenCounts: TokenCounts;
  timestamps: EntryTimestamps;
  usage: EntryUsage;
  feedback: EntryFeedback;
  category: CategoryName;
  tags: string[];
  relatedQueryHashes: string[];
}

// --- Document ---

export interface FeedbackEvent {
  hash: string;
  query: string;
  rating: Rating;
  timestamp: string;
}

export interface GlobalStats {
  totalQueriesSeen: number;
  cacheHitCount: number;
  totalPositiveFeedback: number;
  totalNegativeFeedback: number;
}

export interface DocumentMetadata {
  createdAt: string;
  lastUpdatedAt: string;
}

export interface CacheDocument {
  schemaVersion: '2.0';
  metadata: DocumentMetadata;
  entries: Record<string, QueryEntry>;
  categories: Record<string, string[]>;
  feedbackLog: FeedbackEvent[];
  globalStats: GlobalStats;
}

// --- Operation results ---

export type LookupResult =
  | { hit: true; hash: string; responseText: string; entry: QueryEntry }
  | { hit: false; reason: 'not_found'; hash: string }
  | { hit: false; reason: 'untrusted'; hash: string; entry: QueryEntry };

export interface RecordOptions {
  context?: Record<string, unknown>;
  tokenCounts?: TokenCounts;
}

export interface RecordResult {
  hash: string;
  created: boolean;
}

export interface FeedbackSummary {
  hash: string;
  positiveCount: number;
  negativeCount: number;
  derivedScore: number;
  trusted: boolean;
}

export interface RelateOptions {
  tags?: string[];
}

export interface EntryFilter {
  category?: CategoryName;
  tag?: string;
  trustedOnly?: boolean;
}

export interface EntrySummary {
  hash: string;
  query: string;
  category: CategoryName;
  tags: string[];
  useCount: number;
  positiveCount: number;
  negativeCount: number;
  derivedScore: number;
  trusted: boolean;
  lastUsedAt: string;
}

// --- Statistics ---

export interface TopQuery {
  hash: string;
  query: string;
  useCount: number;
  lastUsedAt: string;
  derivedScore: number;
}

export interface CacheStats {
  cachedEntries: number;
  totalQueriesSeen: number;
  cacheHitCount: number;
  cacheHitRate: number;
  positiveFeedback: number;
  negativeFeedback: number;
  netFeedback: number;
  learningEfficiency: number;
  categoryCounts: Record<CategoryName, number>;
  topQueries: TopQuery[];
}
