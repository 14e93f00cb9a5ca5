import type { RunCreate, TracingConfig } from '@runtrail/shared';
import type { RunTreeNode } from '@runtrail/core';

export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 4)}****${secret.slice(-2)}`;
}

export function formatConfig(config: TracingConfig): string {
  const shown = config.apiKey ? { ...config, apiKey: maskSecret(config.apiKey) } : config;
  return JSON.stringify(shown, null, 2);
}

export function formatRunLine(run: RunCreate): string {
  const parts = [run.name, `[${run.run_type}]`, run.id];
  if (run.thread_id) parts.push(`thread=${run.thread_id}`);
  return parts.join(' ');
}

/** One line per run, children indented two spaces under their parent. */
export function formatRunTree(roots: RunTreeNode<RunCreate>[]): string {
  const lines: string[] = [];
  const visit = (node: RunTreeNode<RunCreate>): void => {
    lines.push(`${'  '.repeat(node.depth)}${formatRunLine(node.run)}`);
    node.children.forEach(visit);
  };
  roots.forEach(visit);
  return lines.join('\n');
}

export function formatTreeSummary(runs: RunCreate[], roots: number): string {
  const traces = new Set(runs.map(r => r.trace_id)).size;
  return `${runs.length} run${runs.length === 1 ? '' : 's'} in ${traces} trace${traces === 1 ? '' : 's'}, ${roots} root${roots === 1 ? '' : 's'}`;
}
