import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'cache-documents',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS cache_documents (
        id         TEXT PRIMARY KEY,
        body       TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);
  },
};
