import { isJsonObject, toJsonValue, type JsonObject } from '@runtrail/shared';
import type { RunTransport } from '@runtrail/client';
import { RunScope } from './run-scope.js';

export const GRAPH_ROOT_NAME = 'Graph';

export interface GraphTraceOptions {
  threadId?: string;
  transport?: RunTransport;
  sessionName?: string;
}

/**
 * Builds a graph-shaped trace: one `Graph` chain root, a chain run per node
 * iteration under it, and llm, decision and tool runs nested in those nodes.
 */
export class GraphTrace {
  private constructor(private readonly root: RunScope) {}

  static async startRoot(inputs: unknown, options: GraphTraceOptions = {}): Promise<GraphTrace> {
    const root = RunScope.root(GRAPH_ROOT_NAME, 'chain', inputs, {
      transport: options.transport,
      sessionName: options.sessionName,
    });
    if (options.threadId) root.withThreadId(options.threadId);
    await root.postStart();
    return new GraphTrace(root);
  }

  get rootScope(): RunScope {
    return this.root;
  }

  async startNodeIteration(node: string, inputs: unknown): Promise<RunScope> {
    const step = this.root.child(node, 'chain', inputs);
    await step.postStart();
    return step;
  }

  /** Records a completed model call. `model`, when given, is added to the inputs. */
  async traceLlmCall(
    parent: RunScope,
    llmName: string,
    inputs: unknown,
    outputs: unknown,
    model?: string,
  ): Promise<void> {
    let llmInputs = inputs;
    if (model !== undefined) {
      const json = toJsonValue(inputs, 'inputs');
      if (isJsonObject(json)) {
        const withModel: JsonObject = { ...json, model };
        llmInputs = withModel;
      }
    }
    await this.completeChild(parent, llmName, 'llm', llmInputs, outputs);
  }

  async traceDecision(parent: RunScope, name: string, inputs: unknown, outputs: unknown): Promise<void> {
    await this.completeChild(parent, name, 'chain', inputs, outputs);
  }

  async traceToolCall(parent: RunScope, toolName: string, inputs: unknown, outputs: unknown): Promise<void> {
    await this.completeChild(parent, `tool/${toolName}`, 'tool', inputs, outputs);
  }

  async endRoot(outputs: unknown): Promise<void> {
    await this.root.endOk(outputs);
  }

  private async completeChild(
    parent: RunScope,
    name: string,
    kind: 'llm' | 'chain' | 'tool',
    inputs: unknown,
    outputs: unknown,
  ): Promise<void> {
    const child = parent.child(name, kind, inputs);
    await child.postStart();
    await child.endOk(outputs);
  }
}
