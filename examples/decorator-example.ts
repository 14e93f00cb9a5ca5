/**
 * Wrapping functions with traceNode
 *
 * Each call becomes a run. Failures reach the caller unchanged and are
 * recorded on the run. Nothing is recorded when tracing is disabled.
 *
 * Usage: npx tsx examples/decorator-example.ts
 */

import { MemoryTransport } from '@runtrail/client';
import { Tracer, traceNode, traceNodeSync, flushPending } from '@runtrail/core';
import { errorMessage, type TracingConfig } from '@runtrail/shared';

const config: TracingConfig = {
  tracingEnabled: true,
  endpoint: 'https://collector.example',
  logging: { level: 'info' },
};

async function main() {
  const transport = new MemoryTransport();
  const parent = new Tracer('batch', 'chain', { items: 2 }, { transport });

  const doubled = await traceNode('double', 'chain', 5, async (x: number) => x * 2, { config, parent });
  console.log(`double(5) = ${doubled}`);

  try {
    await traceNode('parse', 'tool', 'not json', async (text: string): Promise<unknown> => JSON.parse(text), { config, parent });
  } catch (err) {
    console.log(`parse failed as expected: ${errorMessage(err)}`);
  }

  const length = traceNodeSync('length', 'chain', 'hello', (s: string) => s.length, { config, parent });
  console.log(`length("hello") = ${length}`);
  await flushPending();

  const untraced = await traceNode('double', 'chain', 21, async (x: number) => x * 2, {
    config: { ...config, tracingEnabled: false },
    transport,
  });
  console.log(`untraced double(21) = ${untraced}`);

  for (const call of transport.calls) {
    if (call.kind === 'create') {
      console.log(`create ${call.payload.name} parent=${call.payload.parent_run_id ?? '-'}`);
    } else {
      console.log(`update ${call.runId} error=${call.payload.error ?? '-'}`);
    }
  }
}

main().catch(console.error);
