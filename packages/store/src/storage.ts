/**
 * A backend holding exactly one serialized cache document.
 *
 * Backends move opaque JSON text; parsing, validation and migration belong to
 * the cache. Every write replaces the whole document.
 */
export interface CacheStorage {
  /** Human-readable location, used in logs and error messages. */
  readonly description: string;
  /** Returns the stored text, or null when nothing has been written yet. */
  read(): Promise<string | null>;
  write(serialized: string): Promise<void>;
}
