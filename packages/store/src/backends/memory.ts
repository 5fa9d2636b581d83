import type { CacheStorage } from '../storage.js';

/** Keeps the document in process memory. Nothing survives a restart. */
export class MemoryStorage implements CacheStorage {
  readonly description = 'memory';
  private content: string | null;
  private writes = 0;

  constructor(initial?: string) {
    this.content = initial ?? null;
  }

  async read(): Promise<string | null> {
    return this.content;
  }

  async write(serialized: string): Promise<void> {
    this.content = serialized;
    this.writes++;
  }

  /** Number of completed writes since construction. */
  get writeCount(): number {
    return this.writes;
  }

  /** Last written text, or the initial content. */
  snapshot(): string | null {
    return this.content;
  }
}
