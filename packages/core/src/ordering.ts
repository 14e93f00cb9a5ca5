import {
  ORDERING_KEY_SEPARATOR,
  OrderingKeyError,
  formatMicrosCompact,
  isUuid,
  parseMicrosCompact,
  type EpochMicros,
} from '@runtrail/shared';

/**
 * Ordering keys ("dotted order") look like
 *
 *   20240919T171648521691Z0e01bf50-474d-4536-810f-67d3ee7ea3e7.20240919T171648530112Z9a1c...
 *
 * One segment per ancestor, root first. Each segment is a fixed-width UTC
 * timestamp with microseconds followed by the run id, so plain string
 * comparison sorts a whole trace by creation time and a descendant's key
 * always starts with its ancestor's key plus a dot.
 */

const TIMESTAMP_WIDTH = 'YYYYMMDDTHHMMSSffffffZ'.length;

export interface OrderingSegment {
  startTime: EpochMicros;
  runId: string;
}

export function orderingSegment(startTime: EpochMicros, runId: string): string {
  return `${formatMicrosCompact(startTime)}${runId}`;
}

export function deriveOrderingKey(startTime: EpochMicros, runId: string, parentKey?: string): string {
  const own = orderingSegment(startTime, runId);
  return parentKey ? `${parentKey}${ORDERING_KEY_SEPARATOR}${own}` : own;
}

export function parseOrderingKey(key: string): OrderingSegment[] {
  if (key.length === 0) {
    throw new OrderingKeyError(key, 'empty key');
  }
  return key.split(ORDERING_KEY_SEPARATOR).map((segment, index) => {
    const startTime = parseMicrosCompact(segment.slice(0, TIMESTAMP_WIDTH));
    if (startTime === undefined) {
      throw new OrderingKeyError(key, `segment ${index} has no valid timestamp`);
    }
    const runId = segment.slice(TIMESTAMP_WIDTH);
    if (!isUuid(runId)) {
      throw new OrderingKeyError(key, `segment ${index} has no valid run id`);
    }
    return { startTime, runId };
  });
}

/** Key of the parent position, or `undefined` for a single-segment key. */
export function parentOrderingKey(key: string): string | undefined {
  const idx = key.lastIndexOf(ORDERING_KEY_SEPARATOR);
  return idx === -1 ? undefined : key.slice(0, idx);
}

export function isAncestorKey(ancestor: string, descendant: string): boolean {
  return descendant.startsWith(`${ancestor}${ORDERING_KEY_SEPARATOR}`);
}

export function compareOrderingKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface RunTreeNode<T> {
  run: T;
  depth: number;
  children: RunTreeNode<T>[];
}

/**
 * Rebuilds the hierarchy from a flat list using nothing but the keys. Runs
 * whose parent is missing from the list become roots.
 */
export function buildRunTree<T>(runs: T[], keyOf: (run: T) => string): RunTreeNode<T>[] {
  const sorted = [...runs].sort((a, b) => compareOrderingKeys(keyOf(a), keyOf(b)));
  const byKey = new Map<string, RunTreeNode<T>>();
  const roots: RunTreeNode<T>[] = [];

  for (const run of sorted) {
    const key = keyOf(run);
    const parentKey = parentOrderingKey(key);
    const parent = parentKey ? byKey.get(parentKey) : undefined;
    const node: RunTreeNode<T> = { run, depth: parent ? parent.depth + 1 : 0, children: [] };
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    byKey.set(key, node);
  }

  return roots;
}
