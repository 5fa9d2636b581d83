import { describe, it, expect } from 'vitest';
import { createTestDatabase } from '../src/database.js';
import { runMigrations, getCurrentVersion, type Migration } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';

describe('runMigrations', () => {
  it('reports version 0 before anything ran', () => {
    const db = createTestDatabase();
    expect(getCurrentVersion(db)).toBe(0);
    db.close();
  });

  it('creates the cache_documents table', () => {
    const db = createTestDatabase();
    const applied = runMigrations(db, allMigrations);

    expect(applied).toEqual(['cache-documents']);
    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='cache_documents'").all();
    expect(tables).toHaveLength(1);
    expect(getCurrentVersion(db)).toBe(1);
    db.close();
  });

  it('is idempotent — running twice applies nothing new', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);
    const second = runMigrations(db, allMigrations);

    expect(second).toEqual([]);
    expect(getCurrentVersion(db)).toBe(1);
    db.close();
  });

  it('runs migrations in version order regardless of list order', () => {
    const db = createTestDatabase();
    const order: number[] = [];
    const make = (version: number): Migration => ({
      version,
      name: `m${version}`,
      up() { order.push(version); },
    });

    runMigrations(db, [make(3), make(1), make(2)]);
    expect(order).toEqual([1, 2, 3]);
    expect(getCurrentVersion(db)).toBe(3);
    db.close();
  });

  it('rolls back a failing migration', () => {
    const db = createTestDatabase();
    const failing: Migration = {
      version: 1,
      name: 'broken',
      up(d) {
        d.exec('CREATE TABLE half_done (id INTEGER)');
        throw new Error('boom');
      },
    };

    expect(() => runMigrations(db, [failing])).toThrow('boom');
    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='half_done'").all();
    expect(tables).toHaveLength(0);
    expect(getCurrentVersion(db)).toBe(0);
    db.close();
  });
});
