import type { TracingConfig } from '@runtrail/shared';
import { RunClient, type RunTransport } from '@runtrail/client';
import { ConfigManager } from './config-manager.js';
import { setLogLevel } from './logger.js';

interface ProcessSettings {
  config: TracingConfig;
  transport?: RunTransport;
}

let current: ProcessSettings | undefined;

/**
 * Process-wide defaults, read from the environment on first use and cached.
 * Only used when a caller passes no explicit config or transport.
 */
export function getSettings(): TracingConfig {
  return ensureSettings().config;
}

/** Installs explicit defaults, e.g. a config loaded from a file. */
export function configureTracing(config: TracingConfig, transport?: RunTransport): void {
  current = { config, transport };
  setLogLevel(config.logging.level);
}

export function isTracingEnabled(config?: TracingConfig): boolean {
  return (config ?? getSettings()).tracingEnabled;
}

/**
 * Transport for `config`. The process default config shares one cached
 * client; any other config gets a fresh one. Throws `ConfigError` when the
 * API key is missing.
 */
export function transportFor(config?: TracingConfig): RunTransport {
  const settings = ensureSettings();
  if (config && config !== settings.config) {
    return RunClient.fromConfig(config);
  }
  settings.transport ??= RunClient.fromConfig(settings.config);
  return settings.transport;
}

/** Drops the cached defaults so the next call re-reads the environment. */
export function resetSettings(): void {
  current = undefined;
}

function ensureSettings(): ProcessSettings {
  if (current) return current;
  const settings: ProcessSettings = { config: new ConfigManager().loadFromEnv() };
  current = settings;
  setLogLevel(settings.config.logging.level);
  return settings;
}
