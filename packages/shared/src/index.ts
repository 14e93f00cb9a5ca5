export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  BuiltinRunKind,
  RunKind,
  EpochMicros,
  RunMetrics,
  RunCreate,
  RunUpdate,
} from './types/run.js';
export type { RunContext, ContextHeaders } from './types/context.js';
export type { LogLevel, LoggingConfig, TracingConfig } from './types/config.js';
export type {
  ToolCall,
  HumanMessage,
  SystemMessage,
  AIMessage,
  ToolMessage,
  Message,
} from './types/message.js';

export {
  jsonValueSchema,
  jsonObjectSchema,
  builtinRunKindSchema,
  runKindSchema,
  runCreateSchema,
  runUpdateSchema,
  runContextSchema,
} from './schemas/run.schema.js';
export { logLevelSchema, loggingConfigSchema, tracingConfigSchema } from './schemas/config.schema.js';
export {
  toolCallSchema,
  humanMessageSchema,
  systemMessageSchema,
  aiMessageSchema,
  toolMessageSchema,
  messageSchema,
} from './schemas/message.schema.js';

export * from './constants.js';
export * from './utils/index.js';
