import type { JsonObject, JsonValue } from '../types/run.js';
import { jsonValueSchema } from '../schemas/run.schema.js';
import { DEFAULT_INPUT_KEY, DEFAULT_OUTPUT_KEY } from '../constants.js';
import { SerializationError } from './errors.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts an arbitrary value to plain JSON the way `JSON.stringify` sees it.
 * `undefined` (and anything that stringifies to nothing) becomes `null`.
 */
export function toJsonValue(value: unknown, key = 'value'): JsonValue {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new SerializationError(key, err);
  }
  if (text === undefined) return null;
  const parsed: unknown = JSON.parse(text);
  return jsonValueSchema.parse(parsed);
}

/** Serializes `value`, wrapping anything that is not an object as `{ [key]: value }`. */
export function ensureObject(value: unknown, key: string): JsonObject {
  const json = toJsonValue(value, key);
  if (isJsonObject(json)) return json;
  return { [key]: json };
}

export function ensureInputsObject(value: unknown): JsonObject {
  return ensureObject(value, DEFAULT_INPUT_KEY);
}

export function ensureOutputsObject(value: unknown): JsonObject {
  return ensureObject(value, DEFAULT_OUTPUT_KEY);
}
