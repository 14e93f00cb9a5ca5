export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
}

export interface TracingConfig {
  tracingEnabled: boolean;
  endpoint: string;
  apiKey?: string;
  project?: string;
  tenantId?: string;
  logging: LoggingConfig;
}
