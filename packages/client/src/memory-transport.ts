import { TransportError, type RunCreate, type RunUpdate } from '@runtrail/shared';
import type { RunTransport } from './transport.js';

export type RecordedCall =
  | { kind: 'create'; payload: RunCreate }
  | { kind: 'update'; runId: string; payload: RunUpdate };

/**
 * Keeps every payload in memory. Handy for local development and for tests
 * that need to assert what would have been sent.
 */
export class MemoryTransport implements RunTransport {
  readonly calls: RecordedCall[] = [];
  private failWith?: TransportError;

  async createRun(payload: RunCreate): Promise<void> {
    this.calls.push({ kind: 'create', payload });
    if (this.failWith) throw this.failWith;
  }

  async updateRun(runId: string, payload: RunUpdate): Promise<void> {
    this.calls.push({ kind: 'update', runId, payload });
    if (this.failWith) throw this.failWith;
  }

  /** Makes every later call record its payload and then reject. */
  failNextCalls(error = new TransportError('HTTP 503: unavailable', 503, 'unavailable')): void {
    this.failWith = error;
  }

  created(): RunCreate[] {
    const out: RunCreate[] = [];
    for (const call of this.calls) {
      if (call.kind === 'create') out.push(call.payload);
    }
    return out;
  }

  updates(runId?: string): RunUpdate[] {
    const out: RunUpdate[] = [];
    for (const call of this.calls) {
      if (call.kind === 'update' && (runId === undefined || call.runId === runId)) {
        out.push(call.payload);
      }
    }
    return out;
  }

  clear(): void {
    this.calls.length = 0;
    this.failWith = undefined;
  }
}

/** Drops every payload. */
export class NoopTransport implements RunTransport {
  async createRun(): Promise<void> {}
  async updateRun(): Promise<void> {}
}
