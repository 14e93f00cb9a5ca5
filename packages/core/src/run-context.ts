import {
  SESSION_HEADER,
  THREAD_HEADER,
  TRACE_HEADER,
  runContextSchema,
  type ContextHeaders,
  type RunContext,
} from '@runtrail/shared';
import { parentOrderingKey, parseOrderingKey } from './ordering.js';

export function createRunContext(
  traceId: string,
  fields: Omit<RunContext, 'traceId'> = {},
): RunContext {
  return Object.freeze(runContextSchema.parse({ traceId, ...fields }));
}

/**
 * Key a run adopting `ctx` is placed under: the context key itself when it
 * ends with the context's parent id, otherwise the context key minus its
 * last segment (the context then describes a sibling position).
 */
export function parentKeyForContext(ctx: RunContext): string | undefined {
  if (!ctx.orderingKey) return undefined;
  const segments = parseOrderingKey(ctx.orderingKey);
  const last = segments[segments.length - 1];
  if (ctx.parentId && last.runId === ctx.parentId) {
    return ctx.orderingKey;
  }
  return parentOrderingKey(ctx.orderingKey);
}

export function contextToHeaders(ctx: RunContext): ContextHeaders {
  const headers: ContextHeaders = {};
  if (ctx.orderingKey) headers[TRACE_HEADER] = ctx.orderingKey;
  if (ctx.threadId) headers[THREAD_HEADER] = ctx.threadId;
  if (ctx.sessionName) headers[SESSION_HEADER] = ctx.sessionName;
  return headers;
}

type HeaderSource = Headers | Record<string, string | string[] | undefined>;

/**
 * Reads a context written by {@link contextToHeaders}. The run named by the
 * last key segment becomes the parent; the first segment names the trace.
 */
export function contextFromHeaders(headers: HeaderSource): RunContext | undefined {
  const orderingKey = readHeader(headers, TRACE_HEADER);
  if (!orderingKey) return undefined;
  const segments = parseOrderingKey(orderingKey);
  return createRunContext(segments[0].runId, {
    parentId: segments[segments.length - 1].runId,
    orderingKey,
    threadId: readHeader(headers, THREAD_HEADER),
    sessionName: readHeader(headers, SESSION_HEADER),
  });
}

function readHeader(headers: HeaderSource, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  const value = headers[name];
  if (Array.isArray(value)) return value[0];
  return value;
}
