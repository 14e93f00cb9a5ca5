import { Command } from 'commander';
import { RunClient } from '@runtrail/client';
import { ConfigManager } from '@runtrail/core';
import { formatPingResult, pingCollector } from '../ping.js';

export const pingCommand = new Command('ping')
  .description('Send one test run to the configured collector')
  .option('-c, --config <path>', 'Read this config file instead of searching')
  .action(async (options: { config?: string }) => {
    const config = await new ConfigManager().load({ configPath: options.config });
    const client = RunClient.fromConfig(config);
    const result = await pingCollector(client);
    console.log(formatPingResult(result, client.endpoint));
    if (result.status === 'failed') {
      process.exitCode = 1;
    }
  });
