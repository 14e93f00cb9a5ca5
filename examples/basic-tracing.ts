/**
 * Basic tracing
 *
 * Builds a three-level trace by hand with a Tracer and prints the tree the
 * collector would reconstruct. Runs are kept in memory unless
 * RUNTRAIL_TRACING=true and RUNTRAIL_API_KEY are set.
 *
 * Usage: npx tsx examples/basic-tracing.ts
 */

import { RunClient, MemoryTransport, type RunTransport } from '@runtrail/client';
import { ConfigManager, Tracer, buildRunTree, type RunTreeNode } from '@runtrail/core';
import { costMetrics, mergeMetrics, tokenMetrics, type RunCreate } from '@runtrail/shared';

function printTree(nodes: RunTreeNode<RunCreate>[]): void {
  for (const node of nodes) {
    console.log(`${'  '.repeat(node.depth)}${node.run.name} [${node.run.run_type}]`);
    printTree(node.children);
  }
}

async function main() {
  const config = await new ConfigManager().load();
  const memory = new MemoryTransport();
  const transport: RunTransport = config.tracingEnabled && config.apiKey ? RunClient.fromConfig(config) : memory;

  const pipeline = new Tracer('answer-question', 'chain', { question: 'How tall is the lighthouse?' }, {
    transport,
    sessionName: config.project,
    threadId: 'conv-1',
  });
  await pipeline.saveStart();

  const retrieve = pipeline.createChild('retrieve', 'retriever', { query: 'lighthouse height' });
  await retrieve.saveStart();
  await retrieve.saveEnd({ documents: ['The lighthouse is 48 m tall.'] });

  const llm = pipeline.createChild('ChatModel', 'llm', { prompt: 'Answer using the documents.' });
  await llm.saveStart();
  const tool = llm.createChild('unit-convert', 'tool', { metres: 48 });
  await tool.saveStart();
  await tool.saveEnd({ feet: 157.5 });
  await llm.saveEnd('It is 48 m (157 ft) tall.', mergeMetrics(tokenMetrics(42, 11), costMetrics(0.00042, 0.00033)));

  await pipeline.saveEnd({ answer: 'It is 48 m (157 ft) tall.' });

  if (transport === memory) {
    printTree(buildRunTree(memory.created(), run => run.dotted_order ?? ''));
  } else {
    console.log(`Sent trace ${pipeline.traceId} to ${config.endpoint}`);
  }
}

main().catch(console.error);
