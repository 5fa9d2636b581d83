import { StorageIOError, type Clock } from '@qmem/shared';
import { MemoryStorage } from '@qmem/store';

/** In-memory storage whose reads or writes can be switched to fail. */
export class FlakyStorage extends MemoryStorage {
  failReads = false;
  failWrites = false;

  override async read(): Promise<string | null> {
    if (this.failReads) throw new StorageIOError('read', this.description, 'disk unavailable');
    return super.read();
  }

  override async write(serialized: string): Promise<void> {
    if (this.failWrites) throw new StorageIOError('write', this.description, 'disk full');
    return super.write(serialized);
  }
}

/** Clock that advances one second on every reading, starting at `start`. */
export function steppingClock(start = '2026-03-01T00:00:00.000Z'): Clock {
  let t = Date.parse(start);
  return () => {
    t += 1000;
    return new Date(t);
  };
}
