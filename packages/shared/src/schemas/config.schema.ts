import { z } from 'zod';
import { DEFAULT_ENDPOINT } from '../constants.js';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const tracingConfigSchema = z.object({
  tracingEnabled: z.boolean().default(false),
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  apiKey: z.string().min(1).optional(),
  project: z.string().min(1).optional(),
  tenantId: z.string().min(1).optional(),
  logging: loggingConfigSchema.default({}),
});
