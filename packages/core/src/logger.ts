import { pino, type Logger } from 'pino';
import { ENV_VARS, logLevelSchema, type LogLevel } from '@runtrail/shared';

// Same set the config schema accepts for logging.level.
const LEVELS: readonly LogLevel[] = logLevelSchema.options;

function initialLevel(): LogLevel {
  const fromEnv = process.env[ENV_VARS.logLevel];
  return LEVELS.find(level => level === fromEnv) ?? 'info';
}

const root = pino({ name: 'runtrail', level: initialLevel() });
const children = new Set<Logger>();

export const logger: Logger = root;

/** Child logger tagged with the module name. Follows later `setLogLevel` calls. */
export function createLogger(module: string): Logger {
  const child = root.child({ module });
  children.add(child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
}
