import { z } from 'zod';
import { jsonValueSchema } from './run.schema.js';

export const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: jsonValueSchema,
});

export const humanMessageSchema = z.object({
  role: z.literal('human'),
  content: z.string(),
});

export const systemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
});

export const aiMessageSchema = z.object({
  role: z.literal('ai'),
  content: z.string(),
  tool_calls: z.array(toolCallSchema).optional(),
});

export const toolMessageSchema = z.object({
  role: z.literal('tool'),
  tool_call_id: z.string(),
  name: z.string(),
  content: z.string(),
});

export const messageSchema = z.discriminatedUnion('role', [
  humanMessageSchema,
  systemMessageSchema,
  aiMessageSchema,
  toolMessageSchema,
]);
