// ── Storage contract & backends ──────────────────────────────────
export type { CacheStorage } from './storage.js';
export { JsonFileStorage } from './backends/json-file.js';
export { MemoryStorage } from './backends/memory.js';
export { SqliteDocumentStorage } from './backends/sqlite.js';
export { createStorage, DEFAULT_JSON_PATH } from './storage-factory.js';
export type { StorageHandle } from './storage-factory.js';

// ── Database & Migrations ────────────────────────────────────────
export { openDatabase, createTestDatabase, DEFAULT_DB_PATH } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';
