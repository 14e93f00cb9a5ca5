import type { RunMetrics } from '../types/run.js';

export function tokenMetrics(promptTokens: number, completionTokens: number): RunMetrics {
  return {
    promptTokens,
    completionTokens,
    totalTokens: promptTokens + completionTokens,
  };
}

export function costMetrics(promptCost: number, completionCost: number): RunMetrics {
  return {
    promptCost,
    completionCost,
    totalCost: promptCost + completionCost,
  };
}

export function mergeMetrics(...parts: RunMetrics[]): RunMetrics {
  return parts.reduce<RunMetrics>((acc, part) => ({ ...acc, ...part }), {});
}
