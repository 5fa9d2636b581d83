import type Database from 'better-sqlite3';
import { StorageIOError } from '@qmem/shared';
import type { CacheStorage } from '../storage.js';

interface DocumentRow {
  body: string;
}

/**
 * Stores the document as one row of the `cache_documents` table.
 * The table is created by the store migrations (see runMigrations).
 */
export class SqliteDocumentStorage implements CacheStorage {
  readonly description: string;
  private readonly selectStmt: Database.Statement<[string], DocumentRow>;
  private readonly upsertStmt: Database.Statement<[string, string]>;

  constructor(db: Database.Database, private readonly key = 'default') {
    this.description = `sqlite:${db.name}#${key}`;
    this.selectStmt = db.prepare<[string], DocumentRow>(
      'SELECT body FROM cache_documents WHERE id = ?',
    );
    this.upsertStmt = db.prepare<[string, string]>(`
      INSERT INTO cache_documents (id, body, updated_at)
      VALUES (?, ?, datetime('now'))
      ON CONFLICT(id) DO UPDATE SET body = excluded.body, updated_at = excluded.updated_at
    `);
  }

  async read(): Promise<string | null> {
    try {
      const row = this.selectStmt.get(this.key);
      return row ? row.body : null;
    } catch (err) {
      throw new StorageIOError('read', this.description, err);
    }
  }

  async write(serialized: string): Promise<void> {
    try {
      this.upsertStmt.run(this.key, serialized);
    } catch (err) {
      throw new StorageIOError('write', this.description, err);
    }
  }
}
