import { Hono, type Context, type Next } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import {
  MigrationError,
  NotFoundError,
  StorageIOError,
  ValidationError,
} from '@qmem/shared';
import { silentLogger, type Logger, type QmemRuntime, type QueryMemoryCache } from '@qmem/core';
import { cacheRoutes } from './routes/cache.js';
import { statsRoutes } from './routes/stats.js';
import { healthRoutes } from './routes/health.js';

export interface AppOptions {
  logger?: Logger;
  version?: string;
  /** Bearer token required on /stats and /cache/* */
  apiKey?: string;
  /** Allowed CORS origins; CORS is off when omitted. */
  corsOrigins?: string[];
}

type ErrorStatus = 400 | 404 | 500 | 503;

function statusFor(err: Error): ErrorStatus {
  if (err instanceof ValidationError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof StorageIOError) return 503;
  return 500;
}

export function createApp(cache: QueryMemoryCache, options: AppOptions = {}) {
  const app = new Hono();
  const logger = options.logger ?? silentLogger();

  if (options.corsOrigins?.length) {
    app.use('*', cors({
      origin: options.corsOrigins,
      allowMethods: ['GET', 'POST'],
      allowHeaders: ['Content-Type', 'Authorization'],
    }));
  }

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    logger.info({ method: c.req.method, path: c.req.path, status: c.res.status, ms: Date.now() - start }, 'request');
  });

  // Error handling
  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) {
      logger.error({ err }, err instanceof MigrationError ? 'cache unavailable' : 'server error');
      return c.json({ error: err instanceof MigrationError ? err.message : 'Internal server error' }, status);
    }
    logger.warn({ err: err.message, path: c.req.path }, 'request failed');
    return c.json({ error: err.message }, status);
  });

  // Simple API key auth
  const apiKey = options.apiKey;
  if (apiKey) {
    const requireKey = async (c: Context, next: Next) => {
      const key = c.req.header('Authorization')?.replace('Bearer ', '');
      if (key !== apiKey) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
      await next();
    };
    app.use('/stats', requireKey);
    app.use('/stats/*', requireKey);
    app.use('/cache/*', requireKey);
  }

  // Routes
  app.route('/health', healthRoutes(cache, options.version ?? '0.0.0'));
  app.route('/stats', statsRoutes(cache));
  app.route('/cache', cacheRoutes(cache));

  return app;
}

export async function startServer(runtime: QmemRuntime, version: string, port?: number): Promise<void> {
  const { host, apiKey, corsOrigins } = runtime.config.server;
  const listenPort = port ?? runtime.config.server.port;
  const app = createApp(runtime.cache, { logger: runtime.logger, version, apiKey, corsOrigins });

  try {
    await runtime.cache.init();
  } catch (err) {
    runtime.close();
    throw err;
  }

  serve({ fetch: app.fetch, port: listenPort, hostname: host }, () => {
    runtime.logger.info(
      { host, port: listenPort, storage: runtime.cache.storageDescription, auth: Boolean(apiKey) },
      `qmem server listening on http://${host}:${listenPort}`,
    );
  });
}
