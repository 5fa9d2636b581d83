import {
  CURRENT_SCHEMA_VERSION,
  MigrationError,
  StorageIOError,
  cacheDocumentSchema,
  type CacheDocument,
} from '@qmem/shared';
import { buildCategoryIndex } from './document.js';
import { isLegacyDocument, migrateLegacyDocument, type MigrationReport } from './migration.js';

export type DecodeOutcome =
  | { kind: 'current'; document: CacheDocument }
  | { kind: 'migrated'; document: CacheDocument; report: MigrationReport }
  | { kind: 'unreadable'; error: StorageIOError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn stored text into a 2.0 document.
 * Unparseable or invalid 2.0 content is reported as unreadable so the caller
 * can fall back to an empty document; a 1.0 document that cannot be converted
 * throws MigrationError.
 */
export function decodeDocument(raw: string, location: string, now: string): DecodeOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { kind: 'unreadable', error: new StorageIOError('read', location, err) };
  }

  if (!isRecord(parsed)) {
    return { kind: 'unreadable', error: new StorageIOError('read', location, 'document is not an object') };
  }

  if (isLegacyDocument(parsed)) {
    const { document, report } = migrateLegacyDocument(parsed, now);
    return { kind: 'migrated', document, report };
  }

  if (parsed.schemaVersion !== CURRENT_SCHEMA_VERSION) {
    throw new MigrationError(`unsupported schemaVersion ${JSON.stringify(parsed.schemaVersion)}`);
  }

  const result = cacheDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .slice(0, 3)
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join(', ');
    return { kind: 'unreadable', error: new StorageIOError('read', location, detail) };
  }

  const document: CacheDocument = result.data;
  document.categories = buildCategoryIndex(document.entries);
  return { kind: 'current', document };
}
