import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

const TRACKING_TABLE = '_qmem_migrations';

/**
 * Apply pending table migrations in version order, each in its own
 * transaction. Returns the names of the migrations that ran.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${TRACKING_TABLE} (
      version    INTEGER PRIMARY KEY,
      name       TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const currentVersion = getCurrentVersion(db);
  const applied: string[] = [];
  const record = db.prepare(`INSERT INTO ${TRACKING_TABLE} (version, name) VALUES (?, ?)`);

  const pending = [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter(m => m.version > currentVersion);

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
    applied.push(migration.name);
  }

  return applied;
}

/** Highest applied migration version, or 0 before the first run. */
export function getCurrentVersion(db: Database.Database): number {
  const exists = db
    .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(TRACKING_TABLE);
  if (!exists) return 0;

  const row = db
    .prepare<[], { v: number }>(`SELECT COALESCE(MAX(version), 0) AS v FROM ${TRACKING_TABLE}`)
    .get();
  return row?.v ?? 0;
}
