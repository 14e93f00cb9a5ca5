import { readFile } from 'node:fs/promises';
import {
  RunValidationError,
  errorMessage,
  runCreateSchema,
  type RunCreate,
} from '@runtrail/shared';

/**
 * Parses recorded create payloads: either one JSON array or one JSON object
 * per line. Blank lines are skipped.
 */
export function parseRuns(text: string): RunCreate[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];

  if (trimmed.startsWith('[')) {
    const parsed = parseJson(trimmed, 'file');
    if (!Array.isArray(parsed)) {
      throw new RunValidationError('expected a JSON array of runs');
    }
    return parsed.map((value, index) => toRun(value, `entry ${index + 1}`));
  }

  const runs: RunCreate[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) return;
    const where = `line ${index + 1}`;
    runs.push(toRun(parseJson(line, where), where));
  });
  return runs;
}

export async function readRunsFile(path: string): Promise<RunCreate[]> {
  return parseRuns(await readFile(path, 'utf-8'));
}

function parseJson(text: string, where: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new RunValidationError(`${where} is not valid JSON (${errorMessage(err)})`);
  }
}

function toRun(value: unknown, where: string): RunCreate {
  const result = runCreateSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new RunValidationError(`${where}: ${issues}`);
  }
  return result.data;
}
