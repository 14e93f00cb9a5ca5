#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '@runtrail/shared';
import { configCommand } from '../src/commands/config.js';
import { treeCommand } from '../src/commands/tree.js';
import { pingCommand } from '../src/commands/ping.js';

const program = new Command();

program
  .name('runtrail')
  .description('runtrail - hierarchical run tracing client')
  .version('0.1.0');

program.addCommand(configCommand);
program.addCommand(treeCommand);
program.addCommand(pingCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
