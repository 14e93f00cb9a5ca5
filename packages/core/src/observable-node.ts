import { errorMessage, toJsonValue, type JsonValue, type RunKind } from '@runtrail/shared';
import type { Observer } from './observer.js';
import { traceNode, type TraceNodeOptions } from './trace-node.js';

export class ObservableNode {
  private readonly observers: Observer[] = [];

  addObserver(observer: Observer): this {
    this.observers.push(observer);
    return this;
  }

  notifyStart(node: string, inputs: JsonValue): void {
    for (const observer of this.observers) observer.onNodeStart(node, inputs);
  }

  notifyEnd(node: string, outputs: JsonValue): void {
    for (const observer of this.observers) observer.onNodeEnd(node, outputs);
  }

  notifyError(node: string, error: string): void {
    for (const observer of this.observers) observer.onNodeError(node, error);
  }
}

/**
 * Runs a node's work through `traceNode` and reports start, end or error to
 * its observers. Payloads that cannot be turned into JSON are reported as
 * `null`.
 */
export class ObservableNodeWrapper {
  private readonly node = new ObservableNode();

  constructor(
    readonly name: string,
    readonly kind: RunKind,
    private readonly options: TraceNodeOptions = {},
  ) {}

  withObserver(observer: Observer): this {
    this.node.addObserver(observer);
    return this;
  }

  async execute<I, O>(inputs: I, work: (inputs: I) => Promise<O> | O): Promise<O> {
    this.node.notifyStart(this.name, jsonOrNull(inputs));
    let output: O;
    try {
      output = await traceNode(this.name, this.kind, inputs, work, this.options);
    } catch (err) {
      this.node.notifyError(this.name, errorMessage(err));
      throw err;
    }
    this.node.notifyEnd(this.name, jsonOrNull(output));
    return output;
  }
}

function jsonOrNull(value: unknown): JsonValue {
  try {
    return toJsonValue(value);
  } catch {
    return null;
  }
}
