import { z } from 'zod';
import type { JsonValue } from '../types/run.js';
import { RUN_KINDS } from '../constants.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema = z.record(jsonValueSchema);

export const builtinRunKindSchema = z.enum(RUN_KINDS);

export const runKindSchema = z.union([builtinRunKindSchema, z.string().min(1)]);

export const runCreateSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  run_type: runKindSchema,
  inputs: jsonObjectSchema,
  start_time: z.string(),
  parent_run_id: z.string().uuid().optional(),
  trace_id: z.string().uuid(),
  dotted_order: z.string().min(1).optional(),
  session_name: z.string().optional(),
  thread_id: z.string().optional(),
  tags: z.array(z.string()).optional(),
  extra: jsonObjectSchema.optional(),
});

export const runUpdateSchema = z.object({
  outputs: jsonObjectSchema.optional(),
  end_time: z.string().optional(),
  error: z.string().optional(),
  prompt_tokens: z.number().int().nonnegative().optional(),
  completion_tokens: z.number().int().nonnegative().optional(),
  total_tokens: z.number().int().nonnegative().optional(),
  total_cost: z.number().nonnegative().optional(),
});

export const runContextSchema = z.object({
  traceId: z.string().uuid(),
  parentId: z.string().uuid().optional(),
  orderingKey: z.string().min(1).optional(),
  threadId: z.string().optional(),
  sessionName: z.string().optional(),
});
