/**
 * Graph-shaped trace
 *
 * One `Graph` root, a run per node iteration and nested model, decision and
 * tool runs, plus an observer logging each node.
 *
 * Usage: npx tsx examples/graph-trace.ts
 */

import { MemoryTransport } from '@runtrail/client';
import { GraphTrace, LoggingObserver, ObservableNodeWrapper } from '@runtrail/core';
import type { TracingConfig } from '@runtrail/shared';

async function main() {
  const transport = new MemoryTransport();
  const messages = [{ role: 'human', content: 'What is 6 * 7?' }];

  const graph = await GraphTrace.startRoot({ messages }, { transport, threadId: 'conv-42' });

  const chatbot = await graph.startNodeIteration('chatbot', { messages });
  await graph.traceLlmCall(
    chatbot,
    'ChatModel',
    { messages },
    { role: 'ai', tool_calls: [{ id: 'call-1', name: 'calculator', args: { expression: '6 * 7' } }] },
    'small-model',
  );
  await chatbot.endOk({ messages });

  const tools = await graph.startNodeIteration('tools', { messages });
  await graph.traceDecision(tools, 'should_continue', { messages }, { next: 'tools' });
  await graph.traceToolCall(tools, 'calculator', { expression: '6 * 7' }, { result: 42 });
  await tools.endOk({ result: 42 });

  await graph.endRoot({ messages: [...messages, { role: 'ai', content: '42' }] });

  const config: TracingConfig = {
    tracingEnabled: true,
    endpoint: 'https://collector.example',
    logging: { level: 'info' },
  };
  const summarize = new ObservableNodeWrapper('summarize', 'chain', { config, transport })
    .withObserver(new LoggingObserver());
  await summarize.execute({ result: 42 }, async ({ result }) => `The answer is ${result}.`);

  console.log(`${transport.created().length} runs recorded`);
}

main().catch(console.error);
