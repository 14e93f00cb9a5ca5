import { performance } from 'node:perf_hooks';
import type { EpochMicros } from '../types/run.js';

let lastMicros = 0;

/**
 * Current wall-clock time in microseconds. Strictly increasing within the
 * process: two calls never return the same value.
 */
export function epochMicros(): EpochMicros {
  const now = Math.floor((performance.timeOrigin + performance.now()) * 1000);
  lastMicros = now > lastMicros ? now : lastMicros + 1;
  return lastMicros;
}

/** `2024-09-19T17:16:48.521691Z` */
export function formatMicrosIso(micros: EpochMicros): string {
  const seconds = new Date(Math.floor(micros / 1000)).toISOString().slice(0, 19);
  return `${seconds}.${microsPart(micros)}Z`;
}

/** `20240919T171648521691Z`, the timestamp half of an ordering-key segment. */
export function formatMicrosCompact(micros: EpochMicros): string {
  const seconds = new Date(Math.floor(micros / 1000)).toISOString().slice(0, 19);
  return `${seconds.replace(/[-:]/g, '')}${microsPart(micros)}Z`;
}

/** Inverse of {@link formatMicrosCompact}; `undefined` when the text does not match. */
export function parseMicrosCompact(text: string): EpochMicros | undefined {
  const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{6})Z$/.exec(text);
  if (!match) return undefined;
  const [, year, month, day, hour, minute, second, micros] = match;
  const ms = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
  );
  if (Number.isNaN(ms)) return undefined;
  return ms * 1000 + Number(micros);
}

function microsPart(micros: EpochMicros): string {
  const sub = ((micros % 1_000_000) + 1_000_000) % 1_000_000;
  return String(sub).padStart(6, '0');
}
