import type { RunCreate, RunUpdate } from '@runtrail/shared';

/**
 * What the tracer needs from a collector. Implementations reject with a
 * `TransportError` (or `TracingDisabledError`) and never retry.
 */
export interface RunTransport {
  createRun(payload: RunCreate): Promise<void>;
  updateRun(runId: string, payload: RunUpdate): Promise<void>;
}
