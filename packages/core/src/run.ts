import {
  RunAlreadyFinalizedError,
  RunValidationError,
  ensureInputsObject,
  ensureOutputsObject,
  epochMicros,
  formatMicrosIso,
  generateRunId,
  type EpochMicros,
  type JsonObject,
  type RunCreate,
  type RunKind,
  type RunMetrics,
  type RunUpdate,
} from '@runtrail/shared';
import { deriveOrderingKey } from './ordering.js';

export interface RunInit {
  id?: string;
  startTime?: EpochMicros;
}

/**
 * One traced unit of work. Lineage fields hold copied ids only; a run never
 * references another run object.
 */
export class Run {
  readonly id: string;
  readonly name: string;
  readonly kind: RunKind;
  readonly inputs: JsonObject;
  readonly startTime: EpochMicros;

  parentId?: string;
  traceId?: string;
  orderingKey?: string;
  threadId?: string;
  sessionName?: string;
  tags: string[] = [];
  extra: JsonObject = {};

  private _outputs?: JsonObject;
  private _endTime?: EpochMicros;
  private _error?: string;
  private _metrics: RunMetrics = {};

  private constructor(name: string, kind: RunKind, inputs: JsonObject, init: RunInit) {
    this.id = init.id ?? generateRunId();
    this.name = name;
    this.kind = kind;
    this.inputs = inputs;
    this.startTime = init.startTime ?? epochMicros();
  }

  /** Fresh run with no lineage. Non-object inputs are wrapped as `{ input }`. */
  static create(name: string, kind: RunKind, inputs: unknown, init: RunInit = {}): Run {
    return new Run(name, kind, ensureInputsObject(inputs), init);
  }

  get outputs(): JsonObject | undefined {
    return this._outputs;
  }

  get endTime(): EpochMicros | undefined {
    return this._endTime;
  }

  get error(): string | undefined {
    return this._error;
  }

  get metrics(): RunMetrics {
    return { ...this._metrics };
  }

  get finalized(): boolean {
    return this._endTime !== undefined;
  }

  /** Sets outputs and end time together. A run can be finalized once. */
  finalize(outputs: unknown, endTime: EpochMicros = epochMicros()): void {
    if (this.finalized) {
      throw new RunAlreadyFinalizedError(this.id);
    }
    this._outputs = ensureOutputsObject(outputs);
    this._endTime = endTime;
  }

  markFailed(message: string): void {
    this._error = message;
  }

  setMetrics(metrics: RunMetrics): void {
    this._metrics = { ...this._metrics, ...metrics };
  }

  addTags(...tags: string[]): void {
    for (const tag of tags) {
      if (!this.tags.includes(tag)) this.tags.push(tag);
    }
  }

  setExtra(extra: JsonObject): void {
    this.extra = { ...this.extra, ...extra };
  }

  deriveOrderingKey(parentKey?: string): string {
    return deriveOrderingKey(this.startTime, this.id, parentKey);
  }

  toCreate(): RunCreate {
    if (!this.traceId) {
      throw new RunValidationError(`run ${this.id} has no trace id`);
    }
    const payload: RunCreate = {
      id: this.id,
      name: this.name,
      run_type: this.kind,
      inputs: this.inputs,
      start_time: formatMicrosIso(this.startTime),
      trace_id: this.traceId,
    };
    if (this.parentId) payload.parent_run_id = this.parentId;
    if (this.orderingKey) payload.dotted_order = this.orderingKey;
    if (this.sessionName) payload.session_name = this.sessionName;
    if (this.threadId) payload.thread_id = this.threadId;
    if (this.tags.length > 0) payload.tags = [...this.tags];
    if (Object.keys(this.extra).length > 0) payload.extra = this.extra;
    return payload;
  }

  toUpdate(): RunUpdate {
    const update: RunUpdate = {};
    if (this._outputs) update.outputs = this._outputs;
    if (this._endTime !== undefined) update.end_time = formatMicrosIso(this._endTime);
    if (this._error !== undefined) update.error = this._error;
    const m = this._metrics;
    if (m.promptTokens !== undefined) update.prompt_tokens = m.promptTokens;
    if (m.completionTokens !== undefined) update.completion_tokens = m.completionTokens;
    if (m.totalTokens !== undefined) update.total_tokens = m.totalTokens;
    if (m.totalCost !== undefined) update.total_cost = m.totalCost;
    return update;
  }
}
