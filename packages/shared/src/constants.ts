import type { TracingConfig } from './types/config.js';

export const RUN_KINDS = [
  'chain',
  'llm',
  'tool',
  'retriever',
  'embedding',
  'prompt',
  'runnable',
] as const;

export const DEFAULT_ENDPOINT = 'https://api.smith.langchain.com';

export const DEFAULT_INPUT_KEY = 'input';
export const DEFAULT_OUTPUT_KEY = 'output';

export const ORDERING_KEY_SEPARATOR = '.';

export const API_KEY_HEADER = 'x-api-key';
export const TENANT_ID_HEADER = 'x-tenant-id';

export const TRACE_HEADER = 'runtrail-trace';
export const THREAD_HEADER = 'runtrail-thread';
export const SESSION_HEADER = 'runtrail-session';

export const CONFIG_FILE_NAMES = [
  'runtrail.config.yaml',
  'runtrail.config.yml',
  'runtrail.config.json',
] as const;

export const ENV_VARS = {
  tracing: 'RUNTRAIL_TRACING',
  endpoint: 'RUNTRAIL_ENDPOINT',
  apiKey: 'RUNTRAIL_API_KEY',
  project: 'RUNTRAIL_PROJECT',
  tenantId: 'RUNTRAIL_TENANT_ID',
  logLevel: 'RUNTRAIL_LOG_LEVEL',
} as const;

export const DEFAULT_CONFIG: TracingConfig = {
  tracingEnabled: false,
  endpoint: DEFAULT_ENDPOINT,
  logging: {
    level: 'info',
  },
};
