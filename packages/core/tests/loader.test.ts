import { describe, it, expect } from 'vitest';
import { MigrationError, StorageIOError } from '@qmem/shared';
import { decodeDocument } from '../src/loader.js';
import { createEmptyDocument, serializeDocument } from '../src/document.js';
import { migrateLegacyDocument } from '../src/migration.js';
import { queryHash } from '../src/normalize.js';

const NOW = '2026-02-01T00:00:00.000Z';

describe('decodeDocument', () => {
  it('accepts a current document', () => {
    const outcome = decodeDocument(serializeDocument(createEmptyDocument(NOW)), 'memory', NOW);
    expect(outcome.kind).toBe('current');
  });

  it('reports invalid JSON as unreadable', () => {
    const outcome = decodeDocument('{"entries": ', 'memory', NOW);
    expect(outcome.kind).toBe('unreadable');
    if (outcome.kind === 'unreadable') {
      expect(outcome.error).toBeInstanceOf(StorageIOError);
      expect(outcome.error.operation).toBe('read');
    }
  });

  it('reports non-object content as unreadable', () => {
    expect(decodeDocument('[]', 'memory', NOW).kind).toBe('unreadable');
    expect(decodeDocument('"text"', 'memory', NOW).kind).toBe('unreadable');
  });

  it('reports a malformed 2.0 document as unreadable', () => {
    const outcome = decodeDocument('{"schemaVersion":"2.0","entries":{}}', 'memory', NOW);
    expect(outcome.kind).toBe('unreadable');
  });

  it('throws on an unknown schema version', () => {
    expect(() => decodeDocument('{"schemaVersion":"3.0"}', 'memory', NOW)).toThrow(MigrationError);
  });

  it('migrates legacy documents', () => {
    const raw = JSON.stringify({ k: { query: 'Show Users', response: 'alice' } });
    const outcome = decodeDocument(raw, 'memory', NOW);

    expect(outcome.kind).toBe('migrated');
    if (outcome.kind === 'migrated') {
      expect(outcome.document.entries[queryHash('show users')].responseText).toBe('alice');
      expect(outcome.report.migratedEntries).toBe(1);
    }
  });

  it('rebuilds the category index from the entries', () => {
    const { document } = migrateLegacyDocument({ k: { query: 'Drop table users', response: 'ok' } }, NOW);
    document.categories = { general: ['stale'] };

    const outcome = decodeDocument(serializeDocument(document), 'memory', NOW);

    expect(outcome.kind).toBe('current');
    if (outcome.kind === 'current') {
      expect(outcome.document.categories.data_deletion).toEqual([queryHash('drop table users')]);
      expect(outcome.document.categories.general).toEqual([]);
    }
  });
});
