import {
  API_KEY_HEADER,
  TENANT_ID_HEADER,
  ConfigError,
  TracingDisabledError,
  TransportError,
  errorMessage,
  type RunCreate,
  type RunUpdate,
  type TracingConfig,
} from '@runtrail/shared';
import type { RunTransport } from './transport.js';

export interface RunClientOptions {
  endpoint: string;
  apiKey: string;
  tenantId?: string;
  tracingEnabled?: boolean;
}

/**
 * HTTP transport for a run collector: `POST /runs` on start and
 * `PATCH /runs/{id}` on end.
 */
export class RunClient implements RunTransport {
  readonly endpoint: string;
  private apiKey: string;
  private tenantId?: string;
  private tracingEnabled: boolean;

  constructor(options: RunClientOptions) {
    if (!options.apiKey) {
      throw new ConfigError('API key is required to create a run client');
    }
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.tenantId = options.tenantId;
    this.tracingEnabled = options.tracingEnabled ?? true;
  }

  static fromConfig(config: TracingConfig): RunClient {
    if (!config.apiKey) {
      throw new ConfigError('RUNTRAIL_API_KEY is not set');
    }
    return new RunClient({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      tenantId: config.tenantId,
      tracingEnabled: config.tracingEnabled,
    });
  }

  async createRun(payload: RunCreate): Promise<void> {
    await this.send('POST', '/runs', payload);
  }

  async updateRun(runId: string, payload: RunUpdate): Promise<void> {
    await this.send('PATCH', `/runs/${encodeURIComponent(runId)}`, payload);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [API_KEY_HEADER]: this.apiKey,
    };
    if (this.tenantId) {
      headers[TENANT_ID_HEADER] = this.tenantId;
    }
    return headers;
  }

  private async send(method: 'POST' | 'PATCH', path: string, body: RunCreate | RunUpdate): Promise<void> {
    if (!this.tracingEnabled) {
      throw new TracingDisabledError();
    }

    let response: Response;
    try {
      response = await fetch(`${this.endpoint}${path}`, {
        method,
        headers: this.headers(),
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new TransportError(`${method} ${path} failed: ${errorMessage(err)}`, undefined, undefined, err);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new TransportError(`HTTP ${response.status}: ${text}`, response.status, text);
    }
  }
}
