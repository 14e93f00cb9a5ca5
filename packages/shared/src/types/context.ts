/**
 * Portable snapshot of a run's lineage. Carries no handle to any tracer,
 * so it can be copied across tasks or serialised into request headers.
 */
export interface RunContext {
  readonly traceId: string;
  readonly parentId?: string;
  readonly orderingKey?: string;
  readonly threadId?: string;
  readonly sessionName?: string;
}

export type ContextHeaders = Record<string, string>;
