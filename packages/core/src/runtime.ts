import type { QmemConfig } from '@qmem/shared';
import { createStorage, type CacheStorage } from '@qmem/store';
import { ConfigManager, type ConfigLoadOptions } from './config-manager.js';
import { createLogger, type Logger } from './logger.js';
import { QueryMemoryCache } from './query-memory-cache.js';

export interface QmemRuntime {
  config: QmemConfig;
  logger: Logger;
  storage: CacheStorage;
  cache: QueryMemoryCache;
  close(): void;
}

export interface RuntimeOptions extends ConfigLoadOptions {
  /** Applied over the loaded configuration (CLI flags). */
  overrides?: Record<string, unknown>;
  logger?: Logger;
}

/**
 * Load configuration, open the configured storage backend and build a cache
 * on top of it. The document itself is loaded lazily on first use.
 */
export async function createRuntime(options: RuntimeOptions = {}): Promise<QmemRuntime> {
  const manager = new ConfigManager();
  let config = await manager.load(options);
  if (options.overrides) config = manager.set(options.overrides);

  const logger = options.logger ?? createLogger(config.logging.level);
  const handle = createStorage(config.storage, options.cwd);
  const cache = new QueryMemoryCache(handle.storage, {
    logger,
    topQueriesLimit: config.stats.topQueries,
  });

  logger.debug({ storage: handle.storage.description }, 'runtime ready');

  return {
    config,
    logger,
    storage: handle.storage,
    cache,
    close: () => handle.close(),
  };
}
