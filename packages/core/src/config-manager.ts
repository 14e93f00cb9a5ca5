import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import dotenv from 'dotenv';
import {
  type TracingConfig,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  ENV_VARS,
  tracingConfigSchema,
  ConfigError,
  errorMessage,
} from '@runtrail/shared';

type Env = Record<string, string | undefined>;

const MAX_SEARCH_DEPTH = 10;

export interface LoadOptions {
  configPath?: string;
  /** Environment to read instead of `process.env`. Skips `.env` loading. */
  env?: Env;
  cwd?: string;
}

export class ConfigManager {
  private config: TracingConfig = DEFAULT_CONFIG;
  private source?: string;

  async load(options: LoadOptions = {}): Promise<TracingConfig> {
    // 1. Start with defaults
    let merged: Record<string, unknown> = toRecord(structuredClone(DEFAULT_CONFIG));

    // 2. Load config file
    this.source = undefined;
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, readEnv(resolveEnv(options.env)));

    // 4. Validate
    this.config = validate(merged);
    return this.config;
  }

  /** Environment only, synchronous. Used for the process-wide defaults. */
  loadFromEnv(env?: Env): TracingConfig {
    const merged = deepMerge(toRecord(structuredClone(DEFAULT_CONFIG)), readEnv(resolveEnv(env)));
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof TracingConfig>(key: K): TracingConfig[K] {
    return this.config[key];
  }

  getAll(): TracingConfig {
    return this.config;
  }

  /** Config file the last `load` read, if any. */
  get sourcePath(): string | undefined {
    return this.source;
  }

  /** Files `load` would try, nearest first. */
  static searchPaths(cwd: string = process.cwd()): string[] {
    const paths: string[] = [];
    let dir = resolve(cwd);
    for (let depth = 0; depth < MAX_SEARCH_DEPTH; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        paths.push(resolve(dir, name));
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }
    return paths;
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (existsSync(configPath)) {
        return this.parseConfigFile(configPath);
      }
      throw new ConfigError(`Config file not found: ${configPath}`);
    }

    const found = ConfigManager.searchPaths(cwd).find(p => existsSync(p));
    return found ? this.parseConfigFile(found) : null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    this.source = p;
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${p}: ${errorMessage(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }
}

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

function resolveEnv(env?: Env): Env {
  if (env) return env;
  // .env never overrides variables that are already set
  dotenv.config();
  return process.env;
}

function readEnv(env: Env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const tracing = env[ENV_VARS.tracing];
  if (tracing !== undefined) {
    config.tracingEnabled = TRUTHY.has(tracing.trim().toLowerCase());
  }

  if (env[ENV_VARS.endpoint]) {
    config.endpoint = env[ENV_VARS.endpoint];
  }

  if (env[ENV_VARS.apiKey]) {
    config.apiKey = env[ENV_VARS.apiKey];
  }

  if (env[ENV_VARS.project]) {
    config.project = env[ENV_VARS.project];
  }

  if (env[ENV_VARS.tenantId]) {
    config.tenantId = env[ENV_VARS.tenantId];
  }

  if (env[ENV_VARS.logLevel]) {
    config.logging = { level: env[ENV_VARS.logLevel] };
  }

  return config;
}

function validate(merged: Record<string, unknown>): TracingConfig {
  const result = tracingConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(config: TracingConfig): Record<string, unknown> {
  return { ...config };
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}
