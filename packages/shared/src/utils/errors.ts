export class QmemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QmemError';
  }
}

export type StorageOperation = 'open' | 'read' | 'write';

export class StorageIOError extends QmemError {
  constructor(
    public readonly operation: StorageOperation,
    public readonly location: string,
    public readonly cause: unknown,
  ) {
    super(`Storage ${operation} failed: ${location}${describeCause(cause)}`);
    this.name = 'StorageIOError';
  }
}

export class MigrationError extends QmemError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`Migration failed: ${message}`);
    this.name = 'MigrationError';
  }
}

export class NotFoundError extends QmemError {
  constructor(
    public readonly query: string,
    public readonly hash: string,
  ) {
    super(`No cached entry for query: ${query}`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends QmemError {
  constructor(message: string) {
    super(`Validation failed: ${message}`);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends QmemError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return ` (${cause.message})`;
  if (typeof cause === 'string') return ` (${cause})`;
  return '';
}
