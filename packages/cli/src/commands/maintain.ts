import { Command } from 'commander';
import { ConfigManager } from '@steward/core';
import { createMaintainer, createRuntime } from '../setup.js';
import { formatError, formatMaintenanceReport } from '../output/formatter.js';

interface MaintainOptions {
  config?: string;
  json?: boolean;
}

export const maintainCommand = new Command('maintain')
  .description('Fold casual conversation memories into the dynamic memory document')
  .option('-c, --config <path>', 'Config file to use instead of the search path')
  .option('--json', 'Print the report as JSON')
  .action(async (options: MaintainOptions) => {
    try {
      const config = await new ConfigManager().load({ configPath: options.config });
      const runtime = createRuntime(config);
      const report = await createMaintainer(runtime).run();

      console.log(options.json ? JSON.stringify(report, null, 2) : formatMaintenanceReport(report));
    } catch (err) {
      console.error(formatError(err));
      process.exitCode = 1;
    }
  });
