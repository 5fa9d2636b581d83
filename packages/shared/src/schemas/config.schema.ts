import { z } from 'zod';

export const storageConfigSchema = z.object({
  driver: z.enum(['json', 'sqlite', 'memory']).default('json'),
  path: z.string().min(1).optional(),
  key: z.string().min(1).default('default'),
});

export const statsConfigSchema = z.object({
  topQueries: z.number().int().min(1).max(100).default(5),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3928),
  host: z.string().default('127.0.0.1'),
  apiKey: z.string().min(1).optional(),
  corsOrigins: z.array(z.string().min(1)).optional(),
});

export const qmemConfigSchema = z.object({
  storage: storageConfigSchema.default({}),
  stats: statsConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});
