import { errorMessage, TracingDisabledError } from '@runtrail/shared';
import type { RunTransport } from '@runtrail/client';
import { Run } from '@runtrail/core';

export const PING_RUN_NAME = 'runtrail-ping';

export type PingResult =
  | { status: 'ok'; runId: string }
  | { status: 'disabled' }
  | { status: 'failed'; runId: string; error: string };

/**
 * Sends one complete run straight through `transport`. Unlike a tracer this
 * surfaces transport errors.
 */
export async function pingCollector(transport: RunTransport): Promise<PingResult> {
  const run = Run.create(PING_RUN_NAME, 'chain', { ping: true });
  run.traceId = run.id;
  run.orderingKey = run.deriveOrderingKey();
  try {
    await transport.createRun(run.toCreate());
    run.finalize({ pong: true });
    await transport.updateRun(run.id, run.toUpdate());
  } catch (err) {
    if (err instanceof TracingDisabledError) return { status: 'disabled' };
    return { status: 'failed', runId: run.id, error: errorMessage(err) };
  }
  return { status: 'ok', runId: run.id };
}

export function formatPingResult(result: PingResult, endpoint: string): string {
  switch (result.status) {
    case 'ok':
      return `[OK] ${endpoint} accepted run ${result.runId}`;
    case 'disabled':
      return '[SKIP] Tracing is disabled. Set RUNTRAIL_TRACING=true to send runs.';
    case 'failed':
      return `[FAIL] ${endpoint}: ${result.error}`;
  }
}
