import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

export const DEFAULT_DB_PATH = '.qmem/qmem.db';

export interface DatabaseOptions {
  /** Path to the SQLite database file. Defaults to .qmem/qmem.db */
  dbPath?: string;
  /** Directory a relative dbPath is resolved against. Defaults to process.cwd() */
  baseDir?: string;
}

/**
 * Open a database connection with the production pragmas applied.
 * The caller owns the connection and closes it on shutdown.
 */
export function openDatabase(options?: DatabaseOptions): Database.Database {
  const dbPath = path.resolve(options?.baseDir ?? process.cwd(), options?.dbPath ?? DEFAULT_DB_PATH);

  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  try {
    applyPragmas(db);
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}

/**
 * Create an in-memory database with production pragmas.
 * Used for testing — each call returns a fresh isolated DB.
 */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  applyPragmas(db);
  return db;
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');       // 5 s
  db.pragma('temp_store = MEMORY');
}
