import { Command } from 'commander';
import { ConfigManager } from '@steward/core';
import { formatConfigSources, formatError } from '../output/formatter.js';

export const configCommand = new Command('config')
  .description('Inspect Steward configuration');

configCommand
  .command('show')
  .description('Show the resolved configuration with secrets masked')
  .option('-c, --config <path>', 'Config file to use instead of the search path')
  .action(async (options: { config?: string }) => {
    try {
      const config = await new ConfigManager().load({ configPath: options.config });
      console.log(JSON.stringify(ConfigManager.describe(config), null, 2));
    } catch (err) {
      console.error(formatError(err));
      process.exitCode = 1;
    }
  });

configCommand
  .command('path')
  .description('Show where configuration is read from')
  .action(() => {
    console.log(formatConfigSources());
  });
