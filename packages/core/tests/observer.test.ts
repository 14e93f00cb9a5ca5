import { describe, it, expect, vi } from 'vitest';
import type { JsonValue, TracingConfig } from '@runtrail/shared';
import { MemoryTransport } from '@runtrail/client';
import { LoggingObserver, type Observer } from '../src/observer.js';
import { ObservableNode, ObservableNodeWrapper } from '../src/observable-node.js';

const enabled: TracingConfig = {
  tracingEnabled: true,
  endpoint: 'https://collector.test',
  apiKey: 'test-key',
  logging: { level: 'silent' },
};

class RecordingObserver implements Observer {
  events: string[] = [];

  onNodeStart(node: string, inputs: JsonValue): void {
    this.events.push(`start ${node} ${JSON.stringify(inputs)}`);
  }

  onNodeEnd(node: string, outputs: JsonValue): void {
    this.events.push(`end ${node} ${JSON.stringify(outputs)}`);
  }

  onNodeError(node: string, error: string): void {
    this.events.push(`error ${node} ${error}`);
  }
}

describe('ObservableNode', () => {
  it('notifies every observer', () => {
    const first = new RecordingObserver();
    const second = new RecordingObserver();
    const node = new ObservableNode().addObserver(first).addObserver(second);

    node.notifyStart('plan', { goal: 'x' });
    node.notifyError('plan', 'bad');

    expect(first.events).toEqual(['start plan {"goal":"x"}', 'error plan bad']);
    expect(second.events).toEqual(first.events);
  });
});

describe('ObservableNodeWrapper', () => {
  it('reports start and end around the traced work', async () => {
    const transport = new MemoryTransport();
    const observer = new RecordingObserver();
    const wrapper = new ObservableNodeWrapper('double', 'chain', { config: enabled, transport }).withObserver(observer);

    await expect(wrapper.execute(5, async x => x * 2)).resolves.toBe(10);
    expect(observer.events).toEqual(['start double 5', 'end double 10']);
    expect(transport.created()[0].name).toBe('double');
  });

  it('reports errors and rethrows them', async () => {
    const observer = new RecordingObserver();
    const wrapper = new ObservableNodeWrapper('explode', 'tool', {
      config: enabled,
      transport: new MemoryTransport(),
    }).withObserver(observer);
    const boom = new Error('boom');

    await expect(wrapper.execute({}, async () => Promise.reject(boom))).rejects.toBe(boom);
    expect(observer.events).toEqual(['start explode {}', 'error explode boom']);
  });
});

describe('LoggingObserver', () => {
  it('writes one log line per event', () => {
    const log = { info: vi.fn(), error: vi.fn() };
    const observer = new LoggingObserver(log);

    observer.onNodeStart('plan', { goal: 'x' });
    observer.onNodeEnd('plan', 'done');
    observer.onNodeError('plan', 'bad');

    expect(log.info).toHaveBeenNthCalledWith(1, { node: 'plan', inputs: { goal: 'x' } }, 'node started');
    expect(log.info).toHaveBeenNthCalledWith(2, { node: 'plan', outputs: 'done' }, 'node completed');
    expect(log.error).toHaveBeenCalledWith({ node: 'plan', error: 'bad' }, 'node failed');
  });
});
