import {
  generateRunId,
  type RunContext,
  type RunKind,
  type TracingConfig,
} from '@runtrail/shared';
import type { RunTransport } from '@runtrail/client';
import { Tracer } from './tracer.js';
import { createRunContext } from './run-context.js';

export interface TracerFactoryOptions {
  /** Supplies the session name (`project`) for every tracer. */
  config?: TracingConfig;
  transport?: RunTransport;
}

/** Builds tracers that share one transport and config. */
export class TracerFactory {
  constructor(private readonly options: TracerFactoryOptions = {}) {}

  create(name: string, kind: RunKind, inputs: unknown): Tracer {
    return new Tracer(name, kind, inputs, {
      transport: this.options.transport,
      sessionName: this.options.config?.project,
    });
  }

  createWithTransport(name: string, kind: RunKind, inputs: unknown, transport: RunTransport): Tracer {
    return this.create(name, kind, inputs).withTransport(transport);
  }

  createWithThread(name: string, kind: RunKind, inputs: unknown, threadId: string): Tracer {
    return this.create(name, kind, inputs).withThreadId(threadId);
  }

  createWithContext(name: string, kind: RunKind, inputs: unknown, ctx: RunContext): Tracer {
    return this.create(name, kind, inputs).attachContext(ctx);
  }

  /** A tracer that starts its own trace, already keyed as a root. */
  createRoot(name: string, kind: RunKind, inputs: unknown): Tracer {
    const id = generateRunId();
    return new Tracer(name, kind, inputs, {
      id,
      transport: this.options.transport,
      sessionName: this.options.config?.project,
    }).attachContext(createRunContext(id));
  }

  createForNode(name: string, kind: RunKind, inputs: unknown, parentContext?: RunContext): Tracer {
    if (parentContext) return this.createWithContext(name, kind, inputs, parentContext);
    return this.createRoot(name, kind, inputs);
  }
}
