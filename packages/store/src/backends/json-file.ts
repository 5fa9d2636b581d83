import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StorageIOError } from '@qmem/shared';
import type { CacheStorage } from '../storage.js';

/**
 * Stores the document as a pretty-printed JSON file.
 * Writes go to a sibling temp file that is then renamed over the target.
 */
export class JsonFileStorage implements CacheStorage {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = `json:${filePath}`;
  }

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new StorageIOError('read', this.filePath, err);
    }
  }

  async write(serialized: string): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, serialized, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
      throw new StorageIOError('write', this.filePath, err);
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
