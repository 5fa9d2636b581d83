export type StorageDriver = 'json' | 'sqlite' | 'memory';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface StorageConfig {
  driver: StorageDriver;
  /**
   * JSON file, or the SQLite database when driver is sqlite. Defaults to
   * .qmem/memory_cache.json and .qmem/qmem.db respectively.
   */
  path?: string;
  /** Row key of the document inside the SQLite table */
  key: string;
}

export interface StatsConfig {
  topQueries: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface ServerConfig {
  port: number;
  host: string;
  /** When set, /stats and /cache/* require `Authorization: Bearer <apiKey>` */
  apiKey?: string;
  /** Origins allowed by CORS; CORS headers are only sent when set */
  corsOrigins?: string[];
}

export interface QmemConfig {
  storage: StorageConfig;
  stats: StatsConfig;
  logging: LoggingConfig;
  server: ServerConfig;
}
