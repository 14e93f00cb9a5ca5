import {
  DEFAULT_INPUT_KEY,
  DEFAULT_OUTPUT_KEY,
  ensureObject,
  type JsonObject,
} from '@runtrail/shared';

/** Turns traced payloads into the JSON objects sent as run inputs and outputs. */
export interface SerializationStrategy {
  serializeInputs(value: unknown): JsonObject;
  serializeOutputs(value: unknown): JsonObject;
}

/** Objects pass through; anything else is wrapped under a configurable key. */
export class DefaultSerializationStrategy implements SerializationStrategy {
  constructor(
    readonly inputKey: string = DEFAULT_INPUT_KEY,
    readonly outputKey: string = DEFAULT_OUTPUT_KEY,
  ) {}

  serializeInputs(value: unknown): JsonObject {
    return ensureObject(value, this.inputKey);
  }

  serializeOutputs(value: unknown): JsonObject {
    return ensureObject(value, this.outputKey);
  }
}
