export {
  deriveOrderingKey,
  orderingSegment,
  parseOrderingKey,
  parentOrderingKey,
  isAncestorKey,
  compareOrderingKeys,
  buildRunTree,
} from './ordering.js';
export type { OrderingSegment, RunTreeNode } from './ordering.js';
export { Run } from './run.js';
export type { RunInit } from './run.js';
export {
  createRunContext,
  parentKeyForContext,
  contextToHeaders,
  contextFromHeaders,
} from './run-context.js';
export { Tracer } from './tracer.js';
export type { TracerState, TracerOptions, ChildOptions } from './tracer.js';
export { RunScope } from './run-scope.js';
export { traceNode, traceNodeSync, flushPending } from './trace-node.js';
export type { TraceNodeOptions } from './trace-node.js';
export { GraphTrace, GRAPH_ROOT_NAME } from './graph-trace.js';
export type { GraphTraceOptions } from './graph-trace.js';
export { LoggingObserver } from './observer.js';
export type { Observer } from './observer.js';
export { ObservableNode, ObservableNodeWrapper } from './observable-node.js';
export { TracerFactory } from './tracer-factory.js';
export type { TracerFactoryOptions } from './tracer-factory.js';
export { DefaultSerializationStrategy } from './strategies/serialization-strategy.js';
export type { SerializationStrategy } from './strategies/serialization-strategy.js';
export { ConfigManager } from './config-manager.js';
export type { LoadOptions } from './config-manager.js';
export { getSettings, configureTracing, isTracingEnabled, transportFor } from './settings.js';
export { logger, createLogger, setLogLevel } from './logger.js';
