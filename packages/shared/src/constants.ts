import type { CategoryName } from './types/cache.js';
import type { QmemConfig } from './types/config.js';

export const CURRENT_SCHEMA_VERSION = '2.0' as const;

export const CATEGORY_NAMES = [
  'data_deletion',
  'data_modification',
  'data_insertion',
  'schema_operations',
  'database_queries',
  'general',
] as const satisfies readonly CategoryName[];

export interface CategoryRule {
  category: CategoryName;
  keywords: readonly string[];
}

/** Evaluated in order; the first rule with a matching keyword wins. */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: 'data_deletion', keywords: ['delete', 'drop', 'remove'] },
  { category: 'data_modification', keywords: ['update', 'modify', 'change'] },
  { category: 'data_insertion', keywords: ['insert', 'add', 'create'] },
  { category: 'schema_operations', keywords: ['schema', 'table', 'column'] },
  { category: 'database_queries', keywords: ['select', 'list', 'show', 'get', 'find'] },
];

export const FALLBACK_CATEGORY: CategoryName = 'general';

export const TAG_VOCABULARY: readonly string[] = [
  // SQL keywords
  'select', 'insert', 'update', 'delete', 'drop', 'create', 'alter', 'join',
  'where', 'group by', 'order by', 'count', 'distinct', 'limit',
  // Schema objects
  'table', 'column', 'schema', 'index', 'view', 'database', 'primary key',
  'foreign key', 'row',
  // Domain nouns
  'employees', 'users', 'customers', 'orders', 'products', 'departments',
  'salary', 'sales', 'inventory', 'accounts', 'transactions', 'repositories',
  'issues',
];

export const DEFAULT_TOP_QUERIES = 5;

export const DEFAULT_CONFIG: QmemConfig = {
  storage: {
    driver: 'json',
    key: 'default',
  },
  stats: {
    topQueries: DEFAULT_TOP_QUERIES,
  },
  logging: {
    level: 'info',
  },
  server: {
    port: 3928,
    host: '127.0.0.1',
  },
};
