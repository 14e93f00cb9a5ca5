import {
  ConfigError,
  OrderingKeyError,
  SerializationError,
  errorMessage,
  type JsonObject,
  type RunContext,
  type RunKind,
  type TracingConfig,
} from '@runtrail/shared';
import type { RunTransport } from '@runtrail/client';
import { Tracer } from './tracer.js';
import { getSettings, transportFor } from './settings.js';
import {
  DefaultSerializationStrategy,
  type SerializationStrategy,
} from './strategies/serialization-strategy.js';
import { createLogger } from './logger.js';

const log = createLogger('trace-node');

export interface TraceNodeOptions {
  /** Explicit config. Defaults to the process settings read from the environment. */
  config?: TracingConfig;
  transport?: RunTransport;
  /** Nests the run under this tracer instead of starting a new trace. */
  parent?: Tracer;
  context?: RunContext;
  threadId?: string;
  tags?: string[];
  serialization?: SerializationStrategy;
}

const defaultSerialization = new DefaultSerializationStrategy();
const pending = new Set<Promise<void>>();

/**
 * Runs `work` inside a traced run. The caller sees only the work's own result
 * or error; tracing problems are logged. With tracing disabled the work runs
 * directly and no run is created.
 */
export async function traceNode<I, O>(
  name: string,
  kind: RunKind,
  inputs: I,
  work: (inputs: I) => Promise<O> | O,
  options: TraceNodeOptions = {},
): Promise<O> {
  const config = resolveConfig(options);
  if (!config?.tracingEnabled) {
    return work(inputs);
  }

  const serialization = options.serialization ?? defaultSerialization;
  const tracer = startTracer(name, kind, serialization.serializeInputs(inputs), config, options);
  if (!tracer) {
    return work(inputs);
  }

  await quietly(tracer, 'start', () => tracer.saveStart());

  let output: O;
  try {
    output = await work(inputs);
  } catch (err) {
    await quietly(tracer, 'error', () => tracer.saveError(errorMessage(err)));
    throw err;
  }

  const outputs = serializeOutputs(tracer, serialization, output);
  if (outputs instanceof SerializationError) {
    await quietly(tracer, 'error', () => tracer.saveError(outputs.message));
    throw outputs;
  }
  await quietly(tracer, 'end', () => tracer.saveEnd(outputs));
  return output;
}

/**
 * Synchronous variant. Returns as soon as `work` does; the create and update
 * calls are chained in the background; `flushPending` waits for them.
 */
export function traceNodeSync<I, O>(
  name: string,
  kind: RunKind,
  inputs: I,
  work: (inputs: I) => O,
  options: TraceNodeOptions = {},
): O {
  const config = resolveConfig(options);
  if (!config?.tracingEnabled) {
    return work(inputs);
  }

  const serialization = options.serialization ?? defaultSerialization;
  const tracer = startTracer(name, kind, serialization.serializeInputs(inputs), config, options);
  if (!tracer) {
    return work(inputs);
  }

  const started = quietly(tracer, 'start', () => tracer.saveStart());
  track(started);

  let output: O;
  try {
    output = work(inputs);
  } catch (err) {
    const message = errorMessage(err);
    track(started.then(() => quietly(tracer, 'error', () => tracer.saveError(message))));
    throw err;
  }

  const outputs = serializeOutputs(tracer, serialization, output);
  if (outputs instanceof SerializationError) {
    track(started.then(() => quietly(tracer, 'error', () => tracer.saveError(outputs.message))));
    throw outputs;
  }
  track(started.then(() => quietly(tracer, 'end', () => tracer.saveEnd(outputs))));
  return output;
}

/** Waits until every background transmission from `traceNodeSync` has settled. */
export async function flushPending(): Promise<void> {
  while (pending.size > 0) {
    await Promise.all([...pending]);
  }
}

function startTracer(
  name: string,
  kind: RunKind,
  inputs: JsonObject,
  config: TracingConfig,
  options: TraceNodeOptions,
): Tracer | undefined {
  let tracer: Tracer;
  if (options.parent) {
    tracer = options.parent.createChild(name, kind, inputs, { tags: options.tags });
    if (options.transport) tracer.withTransport(options.transport);
  } else {
    const transport = options.transport ?? resolveTransport(config, options.config);
    if (!transport) return undefined;
    tracer = new Tracer(name, kind, inputs, {
      transport,
      sessionName: config.project,
      tags: options.tags,
    });
  }
  if (options.context) adoptContext(tracer, options.context);
  if (options.threadId) tracer.withThreadId(options.threadId);
  return tracer;
}

function resolveConfig(options: TraceNodeOptions): TracingConfig | undefined {
  if (options.config) return options.config;
  try {
    return getSettings();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.warn({ err: err.message }, 'invalid tracing settings, running untraced');
    return undefined;
  }
}

/** A context with a malformed ordering key is ignored; the run stays a root. */
function adoptContext(tracer: Tracer, context: RunContext): void {
  try {
    tracer.attachContext(context);
  } catch (err) {
    if (!(err instanceof OrderingKeyError)) throw err;
    log.warn({ runId: tracer.id, err: err.message }, 'ignoring context with invalid ordering key');
  }
}

function resolveTransport(config: TracingConfig, explicit?: TracingConfig): RunTransport | undefined {
  try {
    return transportFor(explicit);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.warn({ endpoint: config.endpoint, err: err.message }, 'tracing enabled but no client available, running untraced');
    return undefined;
  }
}

function serializeOutputs<O>(
  tracer: Tracer,
  serialization: SerializationStrategy,
  output: O,
): JsonObject | SerializationError {
  try {
    return serialization.serializeOutputs(output);
  } catch (err) {
    if (err instanceof SerializationError) {
      log.error({ runId: tracer.id, err: err.message }, 'output could not be serialized');
      return err;
    }
    throw err;
  }
}

async function quietly(tracer: Tracer, phase: string, save: () => Promise<void>): Promise<void> {
  try {
    await save();
  } catch (err) {
    log.warn({ runId: tracer.id, phase, err: errorMessage(err) }, 'tracing failed');
  }
}

function track(promise: Promise<void>): void {
  pending.add(promise);
  // `quietly` never rejects, so settling is the only outcome to handle.
  void promise.then(() => {
    pending.delete(promise);
  });
}
