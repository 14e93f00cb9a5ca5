import type { RunCreate } from '../types/run.js';
import { RunValidationError } from './errors.js';
import { isJsonObject } from './serialization.js';

/** Checks a create payload before it is sent to the collector. */
export function validateRunCreate(run: RunCreate): void {
  if (run.name.trim().length === 0) {
    throw new RunValidationError('run name cannot be empty');
  }
  if (!isJsonObject(run.inputs)) {
    throw new RunValidationError('run inputs must be an object');
  }
  if (run.dotted_order !== undefined && !run.dotted_order.endsWith(run.id)) {
    throw new RunValidationError(`dotted order does not end with run id ${run.id}`);
  }
}
