export class RuntrailError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntrailError';
  }
}

export class ConfigError extends RuntrailError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Non-2xx response or network failure while talking to the collector. */
export class TransportError extends RuntrailError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    public readonly cause?: unknown,
  ) {
    super(`Transport error: ${message}`);
    this.name = 'TransportError';
  }
}

export class TracingDisabledError extends RuntrailError {
  constructor() {
    super('Tracing is disabled');
    this.name = 'TracingDisabledError';
  }
}

/** A traced payload could not be turned into JSON. */
export class SerializationError extends RuntrailError {
  constructor(
    public readonly key: string,
    public readonly cause: unknown,
  ) {
    super(`Serialization error: cannot serialize ${key} (${errorMessage(cause)})`);
    this.name = 'SerializationError';
  }
}

export class RunValidationError extends RuntrailError {
  constructor(message: string) {
    super(`Run validation failed: ${message}`);
    this.name = 'RunValidationError';
  }
}

export class RunAlreadyFinalizedError extends RuntrailError {
  constructor(public readonly runId: string) {
    super(`Run already finalized: ${runId}`);
    this.name = 'RunAlreadyFinalizedError';
  }
}

export class ScopeConsumedError extends RuntrailError {
  constructor(public readonly runId: string) {
    super(`Run scope already ended: ${runId}`);
    this.name = 'ScopeConsumedError';
  }
}

export class OrderingKeyError extends RuntrailError {
  constructor(
    public readonly key: string,
    reason: string,
  ) {
    super(`Invalid ordering key "${key}": ${reason}`);
    this.name = 'OrderingKeyError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
