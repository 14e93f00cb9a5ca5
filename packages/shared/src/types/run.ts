export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type BuiltinRunKind =
  | 'chain'
  | 'llm'
  | 'tool'
  | 'retriever'
  | 'embedding'
  | 'prompt'
  | 'runnable';

/** Any builtin kind, or a custom kind name sent verbatim as `run_type`. */
export type RunKind = BuiltinRunKind | (string & {});

/** Epoch time in whole microseconds. */
export type EpochMicros = number;

export interface RunMetrics {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  promptCost?: number;
  completionCost?: number;
  totalCost?: number;
}

/** Body of `POST /runs`. */
export interface RunCreate {
  id: string;
  name: string;
  run_type: string;
  inputs: JsonObject;
  start_time: string;
  parent_run_id?: string;
  trace_id: string;
  dotted_order?: string;
  session_name?: string;
  thread_id?: string;
  tags?: string[];
  extra?: JsonObject;
}

/** Body of `PATCH /runs/{id}`. */
export interface RunUpdate {
  outputs?: JsonObject;
  end_time?: string;
  error?: string;
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
  total_cost?: number;
}
