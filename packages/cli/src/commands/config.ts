import { Command } from 'commander';
import { CONFIG_FILE_NAMES, ENV_VARS } from '@runtrail/shared';
import { ConfigManager } from '@runtrail/core';
import { formatConfig } from '../output/formatter.js';

export const configCommand = new Command('config')
  .description('Inspect runtrail configuration');

configCommand
  .command('show')
  .description('Show the loaded configuration (API key masked)')
  .option('-c, --config <path>', 'Read this config file instead of searching')
  .action(async (options: { config?: string }) => {
    const mgr = new ConfigManager();
    const config = await mgr.load({ configPath: options.config });
    console.log(`# source: ${mgr.sourcePath ?? 'defaults and environment'}`);
    console.log(formatConfig(config));
  });

configCommand
  .command('path')
  .description('Show config file search order and environment variables')
  .action(() => {
    console.log('Config files searched from the current directory upward (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => {
      console.log(`  ${i + 1}. ${name}`);
    });
    console.log('');
    console.log('Environment variables (override the file):');
    for (const name of Object.values(ENV_VARS)) {
      console.log(`  ${name}`);
    }
  });
