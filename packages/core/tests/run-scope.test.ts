import { describe, it, expect, beforeEach } from 'vitest';
import { ScopeConsumedError } from '@runtrail/shared';
import { MemoryTransport } from '@runtrail/client';
import { RunScope } from '../src/run-scope.js';
import { createRunContext } from '../src/run-context.js';

describe('RunScope', () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = new MemoryTransport();
  });

  it('posts the start once however often it is asked', async () => {
    const scope = RunScope.root('agent', 'chain', {}, { transport });
    await scope.postStart();
    await scope.postStart();
    expect(scope.posted).toBe(true);
    expect(transport.created()).toHaveLength(1);
  });

  it('is consumed by endOk', async () => {
    const scope = RunScope.root('agent', 'chain', {}, { transport });
    await scope.postStart();
    await scope.endOk({ answer: 42 });

    expect(scope.ended).toBe(true);
    expect(transport.updates(scope.tracer.id)[0].outputs).toEqual({ answer: 42 });
    await expect(scope.endOk({})).rejects.toThrow(ScopeConsumedError);
    await expect(scope.postStart()).rejects.toThrow(ScopeConsumedError);
    expect(() => scope.child('late', 'tool', {})).toThrow(ScopeConsumedError);
  });

  it('is consumed by endError', async () => {
    const scope = RunScope.root('agent', 'chain', {}, { transport });
    await scope.endError(new Error('timeout'), { partial: true });

    const [update] = transport.updates(scope.tracer.id);
    expect(update.error).toBe('timeout');
    expect(update.outputs).toEqual({ partial: true });
    await expect(scope.endError('again')).rejects.toThrow(ScopeConsumedError);
  });

  it('creates child scopes under the same trace', async () => {
    const scope = RunScope.root('agent', 'chain', {}, { transport }).withThreadId('t1');
    const child = scope.child('search', 'tool', { q: 'tides' });
    await child.postStart();

    const [payload] = transport.created();
    expect(payload.parent_run_id).toBe(scope.tracer.id);
    expect(payload.trace_id).toBe(scope.tracer.id);
    expect(payload.thread_id).toBe('t1');
  });

  it('applies a context', () => {
    const traceId = '5f0c6f3a-2b1d-4e8f-9a7b-1c2d3e4f5a6b';
    const scope = RunScope.root('agent', 'chain', {}, { transport }).withContext(
      createRunContext(traceId, { threadId: 'conv-7' }),
    );
    expect(scope.tracer.traceId).toBe(traceId);
    expect(scope.tracer.threadId).toBe('conv-7');
  });
});
