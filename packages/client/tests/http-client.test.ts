import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ConfigError,
  TracingDisabledError,
  TransportError,
  type RunCreate,
} from '@runtrail/shared';
import { RunClient } from '../src/http-client.js';

const mockFetch = vi.fn();

const RUN_ID = '0e01bf50-474d-4536-810f-67d3ee7ea3e7';

const payload: RunCreate = {
  id: RUN_ID,
  name: 'Graph',
  run_type: 'chain',
  inputs: { input: 5 },
  start_time: '2024-09-19T17:16:48.521691Z',
  trace_id: RUN_ID,
  dotted_order: `20240919T171648521691Z${RUN_ID}`,
};

function okResponse() {
  return { ok: true, status: 200, text: async () => '' };
}

describe('RunClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(okResponse());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a run with the api key header', async () => {
    const client = new RunClient({ endpoint: 'https://collector.test/', apiKey: 'test-key' });
    await client.createRun(payload);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://collector.test/runs');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      'x-api-key': 'test-key',
    });
    expect(JSON.parse(init.body)).toEqual(payload);
  });

  it('sends the tenant header when configured', async () => {
    const client = new RunClient({
      endpoint: 'https://collector.test',
      apiKey: 'test-key',
      tenantId: 'tenant-1',
    });
    await client.createRun(payload);

    const [, init] = mockFetch.mock.calls[0];
    expect(init.headers['x-tenant-id']).toBe('tenant-1');
  });

  it('patches an existing run by id', async () => {
    const client = new RunClient({ endpoint: 'https://collector.test', apiKey: 'test-key' });
    await client.updateRun(RUN_ID, { outputs: { output: 10 }, end_time: '2024-09-19T17:16:49.000000Z' });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(`https://collector.test/runs/${RUN_ID}`);
    expect(init.method).toBe('PATCH');
    expect(JSON.parse(init.body)).toEqual({
      outputs: { output: 10 },
      end_time: '2024-09-19T17:16:49.000000Z',
    });
  });

  it('turns a non-2xx response into a TransportError with status and body', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 401, text: async () => 'invalid key' });
    const client = new RunClient({ endpoint: 'https://collector.test', apiKey: 'test-key' });

    await expect(client.createRun(payload)).rejects.toMatchObject({
      name: 'TransportError',
      status: 401,
      body: 'invalid key',
      message: 'Transport error: HTTP 401: invalid key',
    });
  });

  it('wraps network failures', async () => {
    mockFetch.mockRejectedValue(new Error('ECONNREFUSED'));
    const client = new RunClient({ endpoint: 'https://collector.test', apiKey: 'test-key' });

    await expect(client.createRun(payload)).rejects.toThrow(TransportError);
    await expect(client.createRun(payload)).rejects.toThrow('POST /runs failed: ECONNREFUSED');
  });

  it('refuses to send when tracing is disabled', async () => {
    const client = new RunClient({
      endpoint: 'https://collector.test',
      apiKey: 'test-key',
      tracingEnabled: false,
    });

    await expect(client.createRun(payload)).rejects.toThrow(TracingDisabledError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('fromConfig requires an api key', () => {
    expect(() =>
      RunClient.fromConfig({
        tracingEnabled: true,
        endpoint: 'https://collector.test',
        logging: { level: 'info' },
      }),
    ).toThrow(ConfigError);
  });

  it('fromConfig carries endpoint and tenant', async () => {
    const client = RunClient.fromConfig({
      tracingEnabled: true,
      endpoint: 'https://collector.test',
      apiKey: 'test-key',
      tenantId: 'tenant-2',
      logging: { level: 'info' },
    });
    expect(client.endpoint).toBe('https://collector.test');
    await client.createRun(payload);
    const [, init] = mockFetch.mock.calls[0];
    expect(init.headers['x-tenant-id']).toBe('tenant-2');
  });
});
