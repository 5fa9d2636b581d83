import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { StorageIOError, type StorageConfig } from '@qmem/shared';
import type { CacheStorage } from './storage.js';
import { JsonFileStorage } from './backends/json-file.js';
import { MemoryStorage } from './backends/memory.js';
import { SqliteDocumentStorage } from './backends/sqlite.js';
import { DEFAULT_DB_PATH, openDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';

export const DEFAULT_JSON_PATH = '.qmem/memory_cache.json';

export interface StorageHandle {
  storage: CacheStorage;
  /** Releases whatever the backend holds open (the SQLite connection). */
  close(): void;
}

/**
 * Build the backend named by the storage configuration. Relative paths are
 * resolved against `baseDir`. Rejects with StorageIOError when the SQLite
 * database cannot be opened or migrated.
 */
export function createStorage(config: StorageConfig, baseDir: string = process.cwd()): StorageHandle {
  switch (config.driver) {
    case 'json':
      return {
        storage: new JsonFileStorage(path.resolve(baseDir, config.path ?? DEFAULT_JSON_PATH)),
        close: () => {},
      };
    case 'memory':
      return { storage: new MemoryStorage(), close: () => {} };
    case 'sqlite': {
      const db = openSqlite(config, baseDir);
      return {
        storage: new SqliteDocumentStorage(db, config.key),
        close: () => db.close(),
      };
    }
  }
}

function openSqlite(config: StorageConfig, baseDir: string): Database.Database {
  const location = path.resolve(baseDir, config.path ?? DEFAULT_DB_PATH);
  let db: Database.Database;
  try {
    db = openDatabase({ dbPath: config.path, baseDir });
  } catch (err) {
    throw new StorageIOError('open', location, err);
  }
  try {
    runMigrations(db, allMigrations);
  } catch (err) {
    db.close();
    throw new StorageIOError('open', location, err);
  }
  return db;
}
