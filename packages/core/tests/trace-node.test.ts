import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SerializationError,
  type RunCreate,
  type RunUpdate,
  type TracingConfig,
} from '@runtrail/shared';
import { MemoryTransport, type RunTransport } from '@runtrail/client';
import { traceNode, traceNodeSync, flushPending } from '../src/trace-node.js';
import { Tracer } from '../src/tracer.js';
import { createRunContext } from '../src/run-context.js';
import { DefaultSerializationStrategy } from '../src/strategies/serialization-strategy.js';
import { resetSettings } from '../src/testing.js';

const enabled: TracingConfig = {
  tracingEnabled: true,
  endpoint: 'https://collector.test',
  apiKey: 'test-key',
  project: 'demo',
  logging: { level: 'silent' },
};

const disabled: TracingConfig = { ...enabled, tracingEnabled: false };

class CountingTransport implements RunTransport {
  creates = 0;
  updates = 0;

  async createRun(_payload: RunCreate): Promise<void> {
    this.creates++;
  }

  async updateRun(_runId: string, _payload: RunUpdate): Promise<void> {
    this.updates++;
  }
}

const double = async (x: number): Promise<number> => x * 2;

describe('traceNode', () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = new MemoryTransport();
  });

  it('runs the work directly when tracing is disabled', async () => {
    const counting = new CountingTransport();
    const result = await traceNode('double', 'chain', 5, double, { config: disabled, transport: counting });
    expect(result).toBe(10);
    expect(counting.creates).toBe(0);
    expect(counting.updates).toBe(0);
  });

  it('records inputs and outputs', async () => {
    const result = await traceNode('double', 'chain', 5, double, { config: enabled, transport });
    expect(result).toBe(10);

    const [created] = transport.created();
    expect(created.name).toBe('double');
    expect(created.inputs).toEqual({ input: 5 });
    expect(created.session_name).toBe('demo');
    expect(transport.updates(created.id)).toEqual([
      expect.objectContaining({ outputs: { output: 10 } }),
    ]);
  });

  it('returns the original error when the work fails', async () => {
    const boom = new Error('boom');
    const failing = async (): Promise<number> => {
      throw boom;
    };

    await expect(traceNode('explode', 'chain', 5, failing, { config: enabled, transport })).rejects.toBe(boom);
    const [created] = transport.created();
    expect(transport.updates(created.id)[0].error).toBe('boom');
  });

  it('returns the original error when the transport fails too', async () => {
    const boom = new Error('boom');
    transport.failNextCalls();

    await expect(
      traceNode('explode', 'chain', 5, () => Promise.reject(boom), { config: enabled, transport }),
    ).rejects.toBe(boom);
    expect(transport.calls.map(c => c.kind)).toEqual(['create', 'update']);
  });

  it('returns the result when the transport fails', async () => {
    transport.failNextCalls();
    await expect(traceNode('double', 'chain', 5, double, { config: enabled, transport })).resolves.toBe(10);
  });

  it('rejects inputs that cannot be serialized without running the work', async () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    let ran = false;

    await expect(
      traceNode('cyclic', 'chain', cyclic, () => {
        ran = true;
      }, { config: enabled, transport }),
    ).rejects.toThrow(SerializationError);
    expect(ran).toBe(false);
    expect(transport.calls).toHaveLength(0);
  });

  it('ends the run with an error when the output cannot be serialized', async () => {
    await expect(
      traceNode('big', 'chain', 1, () => BigInt(1), { config: enabled, transport }),
    ).rejects.toThrow(SerializationError);
    const [created] = transport.created();
    expect(transport.updates(created.id)[0].error).toMatch(/^Serialization error: cannot serialize output/);
  });

  it('runs untraced when no client can be built', async () => {
    const { apiKey: _omitted, ...withoutKey } = enabled;
    await expect(traceNode('double', 'chain', 5, double, { config: withoutKey })).resolves.toBe(10);
  });

  it('nests under a parent tracer', async () => {
    const parent = new Tracer('graph', 'chain', {}, { transport });
    await traceNode('step', 'tool', { q: 1 }, async () => 'ok', { config: enabled, parent });

    const [created] = transport.created();
    expect(created.parent_run_id).toBe(parent.id);
    expect(created.trace_id).toBe(parent.id);
  });

  it('applies context and thread options', async () => {
    const traceId = '5f0c6f3a-2b1d-4e8f-9a7b-1c2d3e4f5a6b';
    await traceNode('step', 'chain', {}, async () => null, {
      config: enabled,
      transport,
      context: createRunContext(traceId),
      threadId: 't1',
    });

    const [created] = transport.created();
    expect(created.trace_id).toBe(traceId);
    expect(created.thread_id).toBe('t1');
  });

  it('starts a new trace when a context has a malformed ordering key', async () => {
    const traceId = '5f0c6f3a-2b1d-4e8f-9a7b-1c2d3e4f5a6b';
    const result = await traceNode('double', 'chain', 5, double, {
      config: enabled,
      transport,
      context: { traceId, orderingKey: 'abc' },
    });
    expect(result).toBe(10);

    const [created] = transport.created();
    expect(created.trace_id).toBe(created.id);
    expect(created.parent_run_id).toBeUndefined();
  });

  it('uses the configured wrapping keys', async () => {
    await traceNode('double', 'chain', 5, double, {
      config: enabled,
      transport,
      serialization: new DefaultSerializationStrategy('x', 'y'),
    });
    const [created] = transport.created();
    expect(created.inputs).toEqual({ x: 5 });
    expect(transport.updates(created.id)[0].outputs).toEqual({ y: 10 });
  });
});

describe('traceNodeSync', () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = new MemoryTransport();
  });

  it('returns synchronously and sends create then update', async () => {
    const result = traceNodeSync('double', 'chain', 5, (x: number) => x * 2, { config: enabled, transport });
    expect(result).toBe(10);

    await flushPending();
    expect(transport.calls.map(c => c.kind)).toEqual(['create', 'update']);
    expect(transport.updates()[0].outputs).toEqual({ output: 10 });
  });

  it('rethrows the work error and records it', async () => {
    const boom = new Error('boom');
    expect(() =>
      traceNodeSync('explode', 'chain', 5, () => {
        throw boom;
      }, { config: enabled, transport }),
    ).toThrow(boom);

    await flushPending();
    expect(transport.updates()[0].error).toBe('boom');
  });

  it('skips tracing when disabled', async () => {
    const counting = new CountingTransport();
    expect(traceNodeSync('double', 'chain', 5, (x: number) => x * 2, { config: disabled, transport: counting })).toBe(10);
    await flushPending();
    expect(counting.creates + counting.updates).toBe(0);
  });
});

describe('traceNode with invalid process settings', () => {
  afterEach(() => {
    resetSettings();
    vi.unstubAllEnvs();
  });

  it('still runs the work', async () => {
    vi.stubEnv('RUNTRAIL_TRACING', 'true');
    vi.stubEnv('RUNTRAIL_LOG_LEVEL', 'verbose');
    let ran = false;
    const result = await traceNode('double', 'chain', 5, async (x: number) => {
      ran = true;
      return x * 2;
    });
    expect(result).toBe(10);
    expect(ran).toBe(true);
  });

  it('still runs synchronous work', () => {
    vi.stubEnv('RUNTRAIL_TRACING', 'false');
    vi.stubEnv('RUNTRAIL_LOG_LEVEL', 'verbose');
    expect(traceNodeSync('double', 'chain', 5, (x: number) => x * 2)).toBe(10);
  });
});
