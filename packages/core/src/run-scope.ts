import {
  ScopeConsumedError,
  errorMessage,
  type RunContext,
  type RunKind,
} from '@runtrail/shared';
import { Tracer, type TracerOptions } from './tracer.js';

/**
 * Single-use wrapper around a tracer. `postStart` may be repeated; ending the
 * scope (successfully or not) consumes it.
 */
export class RunScope {
  private _posted = false;
  private consumed = false;

  constructor(private readonly _tracer: Tracer) {}

  static root(name: string, kind: RunKind, inputs: unknown, options?: TracerOptions): RunScope {
    return new RunScope(new Tracer(name, kind, inputs, options));
  }

  get tracer(): Tracer {
    return this._tracer;
  }

  get posted(): boolean {
    return this._posted;
  }

  get ended(): boolean {
    return this.consumed;
  }

  child(name: string, kind: RunKind, inputs: unknown): RunScope {
    this.assertOpen();
    return new RunScope(this._tracer.createChild(name, kind, inputs));
  }

  withThreadId(threadId: string): this {
    this.assertOpen();
    this._tracer.withThreadId(threadId);
    return this;
  }

  withContext(ctx: RunContext): this {
    this.assertOpen();
    this._tracer.attachContext(ctx);
    return this;
  }

  async postStart(): Promise<void> {
    this.assertOpen();
    if (this._posted) return;
    this._posted = true;
    await this._tracer.saveStart();
  }

  async endOk(outputs: unknown): Promise<void> {
    this.consume();
    await this._tracer.saveEnd(outputs);
  }

  async endError(error: unknown, outputs?: unknown): Promise<void> {
    this.consume();
    await this._tracer.saveError(errorMessage(error), outputs);
  }

  private consume(): void {
    this.assertOpen();
    this.consumed = true;
  }

  private assertOpen(): void {
    if (this.consumed) {
      throw new ScopeConsumedError(this._tracer.id);
    }
  }
}
