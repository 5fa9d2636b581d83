import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type QmemConfig,
  DEFAULT_CONFIG,
  qmemConfigSchema,
  ConfigError,
} from '@qmem/shared';

export const CONFIG_FILE_NAMES = ['qmem.config.yaml', 'qmem.config.yml', 'qmem.config.json'];

export interface ConfigLoadOptions {
  /** Explicit config file; skips the directory search. */
  configPath?: string;
  /**
   * Where the search for a config file starts, and the base of relative
   * storage paths. Defaults to process.cwd().
   */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: QmemConfig = structuredClone(DEFAULT_CONFIG);

  async load(options: ConfigLoadOptions = {}): Promise<QmemConfig> {
    // 1. Start with defaults
    let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    // 4. Validate
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof QmemConfig>(key: K): QmemConfig[K] {
    return this.config[key];
  }

  getAll(): QmemConfig {
    return this.config;
  }

  /** Apply overrides (e.g. CLI flags) on top of the loaded configuration. */
  set(overrides: Record<string, unknown>): QmemConfig {
    this.config = validate(deepMerge({ ...structuredClone(this.config) }, overrides));
    return this.config;
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigError(`config file not found: ${configPath}`);
      }
      return parseConfigFile(configPath);
    }

    // Search the start directory and its parents
    let dir = resolve(cwd ?? process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }
}

function validate(candidate: Record<string, unknown>): QmemConfig {
  const result = qmemConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

async function parseConfigFile(p: string): Promise<Record<string, unknown>> {
  const content = await readFile(p, 'utf-8');
  let parsed: unknown;
  try {
    parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${p} must contain a mapping at the top level`);
  }
  return parsed;
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, Record<string, unknown>> = {};
  const section = (name: string): Record<string, unknown> => (config[name] ??= {});

  if (env.QMEM_STORAGE_DRIVER) {
    section('storage').driver = env.QMEM_STORAGE_DRIVER;
  }

  if (env.QMEM_STORAGE_PATH) {
    section('storage').path = env.QMEM_STORAGE_PATH;
  }

  if (env.QMEM_LOG_LEVEL) {
    section('logging').level = env.QMEM_LOG_LEVEL;
  }

  if (env.QMEM_SERVER_PORT) {
    section('server').port = parseInteger('QMEM_SERVER_PORT', env.QMEM_SERVER_PORT);
  }

  if (env.QMEM_API_KEY) {
    section('server').apiKey = env.QMEM_API_KEY;
  }

  if (env.QMEM_CORS_ORIGINS) {
    section('server').corsOrigins = env.QMEM_CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean);
  }

  if (env.QMEM_TOP_QUERIES) {
    section('stats').topQueries = parseInteger('QMEM_TOP_QUERIES', env.QMEM_TOP_QUERIES);
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = target[key];
    if (isRecord(incoming) && isRecord(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else if (incoming !== undefined) {
      result[key] = incoming;
    }
  }
  return result;
}
