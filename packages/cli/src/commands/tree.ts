import { Command } from 'commander';
import { buildRunTree } from '@runtrail/core';
import { readRunsFile } from '../runs-file.js';
import { formatRunTree, formatTreeSummary } from '../output/formatter.js';

export const treeCommand = new Command('tree')
  .description('Print recorded runs as a tree, ordered by their ordering keys')
  .argument('<file>', 'JSON array or JSON-lines file of run create payloads')
  .action(async (file: string) => {
    const runs = await readRunsFile(file);
    const keyed = runs.filter(run => run.dotted_order !== undefined);
    const roots = buildRunTree(keyed, run => run.dotted_order ?? '');
    console.log(formatRunTree(roots));
    console.log('');
    console.log(formatTreeSummary(keyed, roots.length));
    if (keyed.length < runs.length) {
      console.log(`${runs.length - keyed.length} run(s) without an ordering key skipped`);
    }
  });
