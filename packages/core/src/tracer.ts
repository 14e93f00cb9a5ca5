import {
  RunAlreadyFinalizedError,
  TracingDisabledError,
  errorMessage,
  validateRunCreate,
  type ContextHeaders,
  type JsonObject,
  type RunContext,
  type RunKind,
  type RunMetrics,
} from '@runtrail/shared';
import type { RunTransport } from '@runtrail/client';
import { Run, type RunInit } from './run.js';
import { parentKeyForContext, contextToHeaders } from './run-context.js';
import { transportFor } from './settings.js';
import { createLogger } from './logger.js';

const log = createLogger('tracer');

export type TracerState = 'created' | 'started' | 'finished';

export interface TracerOptions extends RunInit {
  /** Shared with every child. Falls back to the process default client. */
  transport?: RunTransport;
  threadId?: string;
  sessionName?: string;
  tags?: string[];
  extra?: JsonObject;
}

export type ChildOptions = Omit<TracerOptions, 'transport'>;

/**
 * Live handle on one run: derives children and drives the two-phase save
 * (create on start, update on end). Transport failures are logged and
 * swallowed so tracing never breaks the traced work.
 */
export class Tracer {
  readonly run: Run;
  private transport?: RunTransport;
  private _state: TracerState = 'created';

  constructor(name: string, kind: RunKind, inputs: unknown, options: TracerOptions = {}) {
    this.run = Run.create(name, kind, inputs, { id: options.id, startTime: options.startTime });
    this.transport = options.transport;
    this.run.threadId = options.threadId;
    this.run.sessionName = options.sessionName;
    if (options.tags) this.run.addTags(...options.tags);
    if (options.extra) this.run.setExtra(options.extra);
  }

  get id(): string {
    return this.run.id;
  }

  get name(): string {
    return this.run.name;
  }

  get kind(): RunKind {
    return this.run.kind;
  }

  get traceId(): string | undefined {
    return this.run.traceId;
  }

  get parentId(): string | undefined {
    return this.run.parentId;
  }

  get orderingKey(): string | undefined {
    return this.run.orderingKey;
  }

  get threadId(): string | undefined {
    return this.run.threadId;
  }

  get sessionName(): string | undefined {
    return this.run.sessionName;
  }

  get state(): TracerState {
    return this._state;
  }

  withTransport(transport: RunTransport): this {
    this.transport = transport;
    return this;
  }

  withThreadId(threadId: string): this {
    this.run.threadId = threadId;
    return this;
  }

  createChild(name: string, kind: RunKind, inputs: unknown, options: ChildOptions = {}): Tracer {
    // A parent that has not been saved yet takes its root linkage now so the
    // child can be keyed under it; the key is the same one a later save
    // would assign.
    this.resolveRootLinkage();

    const child = new Tracer(name, kind, inputs, {
      ...options,
      transport: this.transport,
      threadId: options.threadId ?? this.run.threadId,
      sessionName: options.sessionName ?? this.run.sessionName,
    });
    child.run.parentId = this.run.id;
    child.run.traceId = this.run.traceId ?? this.run.id;
    child.run.orderingKey = child.run.deriveOrderingKey(this.run.orderingKey);
    return child;
  }

  /**
   * Places this run in the lineage described by `ctx`. Trace, thread and
   * session come from the context; the ordering key is derived under the
   * context's parent position (see `parentKeyForContext`).
   */
  attachContext(ctx: RunContext): this {
    // Derive first so a bad key leaves the run untouched.
    const orderingKey = ctx.orderingKey
      ? this.run.deriveOrderingKey(parentKeyForContext(ctx))
      : undefined;
    this.run.traceId = ctx.traceId;
    if (ctx.parentId) this.run.parentId = ctx.parentId;
    if (ctx.threadId) this.run.threadId = ctx.threadId;
    if (ctx.sessionName) this.run.sessionName = ctx.sessionName;
    if (orderingKey) this.run.orderingKey = orderingKey;
    return this;
  }

  exportContext(): RunContext {
    return Object.freeze({
      traceId: this.run.traceId ?? this.run.id,
      parentId: this.run.parentId,
      orderingKey: this.run.orderingKey,
      threadId: this.run.threadId,
      sessionName: this.run.sessionName,
    });
  }

  /** Context for runs started elsewhere that should hang under this one. */
  childContext(): RunContext {
    this.resolveRootLinkage();
    return Object.freeze({
      traceId: this.run.traceId ?? this.run.id,
      parentId: this.run.id,
      orderingKey: this.run.orderingKey,
      threadId: this.run.threadId,
      sessionName: this.run.sessionName,
    });
  }

  toHeaders(): ContextHeaders {
    return contextToHeaders(this.childContext());
  }

  /** Sends the create payload. Does nothing once the run has been started. */
  async saveStart(): Promise<void> {
    if (this._state !== 'created') {
      log.debug({ runId: this.run.id, state: this._state }, 'saveStart ignored');
      return;
    }
    this.resolveRootLinkage();
    const payload = this.run.toCreate();
    validateRunCreate(payload);
    this._state = 'started';
    await this.transmit('create', transport => transport.createRun(payload));
  }

  async saveEnd(outputs: unknown, metrics?: RunMetrics): Promise<void> {
    if (metrics) this.run.setMetrics(metrics);
    this.run.finalize(outputs);
    this._state = 'finished';
    await this.transmit('update', transport => transport.updateRun(this.run.id, this.run.toUpdate()));
  }

  async saveError(message: string, outputs: unknown = {}): Promise<void> {
    if (this.run.finalized) {
      throw new RunAlreadyFinalizedError(this.run.id);
    }
    this.run.markFailed(message);
    await this.saveEnd(outputs);
  }

  private resolveRootLinkage(): void {
    this.run.traceId ??= this.run.id;
    if (this.run.orderingKey === undefined && this.run.traceId === this.run.id) {
      this.run.orderingKey = this.run.deriveOrderingKey();
    }
  }

  private async transmit(phase: 'create' | 'update', send: (transport: RunTransport) => Promise<void>): Promise<void> {
    const transport = this.transport ?? transportFor();
    try {
      await send(transport);
    } catch (err) {
      if (err instanceof TracingDisabledError) {
        log.debug({ runId: this.run.id, phase }, 'tracing disabled, run not sent');
        return;
      }
      log.warn({ runId: this.run.id, phase, err: errorMessage(err) }, 'failed to send run');
    }
  }
}
