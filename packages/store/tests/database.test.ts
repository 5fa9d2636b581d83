import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createTestDatabase, openDatabase } from '../src/database.js';

describe('createTestDatabase', () => {
  it('creates an in-memory database', () => {
    const db = createTestDatabase();
    expect(db.open).toBe(true);
    expect(db.memory).toBe(true);
    db.close();
  });

  it('applies WAL mode', () => {
    const db = createTestDatabase();
    const mode = db.pragma('journal_mode', { simple: true });
    // In-memory databases may report 'memory' or 'wal'
    expect(['wal', 'memory']).toContain(mode);
    db.close();
  });

  it('creates isolated databases per call', () => {
    const db1 = createTestDatabase();
    const db2 = createTestDatabase();
    db1.exec('CREATE TABLE test1 (id INTEGER)');

    const tables = db2.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='test1'").all();
    expect(tables).toHaveLength(0);

    db1.close();
    db2.close();
  });
});

describe('openDatabase', () => {
  let tempDir: string;

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qmem-db-'));
    const dbPath = path.join(tempDir, 'nested', 'dir', 'qmem.db');
    const db = openDatabase({ dbPath });
    expect(fs.existsSync(dbPath)).toBe(true);
    db.close();
  });

  it('defaults to .qmem/qmem.db under the base directory', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qmem-db-'));
    const db = openDatabase({ baseDir: tempDir });
    expect(db.name).toBe(path.join(tempDir, '.qmem', 'qmem.db'));
    db.close();
  });

  it('closes the connection when the file is not a database', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qmem-db-'));
    const dbPath = path.join(tempDir, 'cache.json');
    fs.writeFileSync(dbPath, '{"schemaVersion":"2.0"}');
    expect(() => openDatabase({ dbPath })).toThrow();
    expect(fs.readFileSync(dbPath, 'utf-8')).toBe('{"schemaVersion":"2.0"}');
  });
});
