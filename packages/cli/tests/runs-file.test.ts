import { describe, it, expect } from 'vitest';
import { RunValidationError } from '@runtrail/shared';
import { parseRuns } from '../src/runs-file.js';

const RUN_ID = '0e01bf50-474d-4536-810f-67d3ee7ea3e7';

const payload = {
  id: RUN_ID,
  name: 'Graph',
  run_type: 'chain',
  inputs: { q: 'x' },
  start_time: '2024-09-19T17:16:48.521691Z',
  trace_id: RUN_ID,
  dotted_order: `20240919T171648521691Z${RUN_ID}`,
};

describe('parseRuns', () => {
  it('reads a JSON array', () => {
    expect(parseRuns(JSON.stringify([payload]))).toEqual([payload]);
  });

  it('reads JSON lines and skips blank lines', () => {
    const text = `${JSON.stringify(payload)}\n\n${JSON.stringify({ ...payload, name: 'again' })}\n`;
    expect(parseRuns(text).map(r => r.name)).toEqual(['Graph', 'again']);
  });

  it('returns nothing for an empty file', () => {
    expect(parseRuns('  \n')).toEqual([]);
  });

  it('names the line that is not JSON', () => {
    const text = `${JSON.stringify(payload)}\n{oops`;
    expect(() => parseRuns(text)).toThrow(/line 2 is not valid JSON/);
  });

  it('names the entry that fails validation', () => {
    const text = JSON.stringify([payload, { ...payload, id: 'nope' }]);
    expect(() => parseRuns(text)).toThrow(RunValidationError);
    expect(() => parseRuns(text)).toThrow(/entry 2: id: Invalid uuid/);
  });
});
