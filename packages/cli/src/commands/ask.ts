import { Command } from 'commander';
import { isoNow, type QuestionContext } from '@steward/shared';
import { ConfigManager, type Logger } from '@steward/core';
import { createRuntime } from '../setup.js';
import { exitCodeFor, formatError, formatRunSummary } from '../output/formatter.js';

interface AskOptions {
  question: string;
  user: string;
  time?: string;
  config?: string;
  json?: boolean;
  deliver: boolean;
}

export const askCommand = new Command('ask')
  .description('Answer a question and deliver the answer to the configured webhook')
  .requiredOption('-q, --question <text>', 'Question to answer')
  .option('-u, --user <name>', 'Who is asking', 'anonymous')
  .option('-t, --time <timestamp>', 'When the question was asked (default: now)')
  .option('-c, --config <path>', 'Config file to use instead of the search path')
  .option('--json', 'Print the full result as JSON')
  .option('--no-deliver', 'Do not post the answer to the webhook')
  .action(async (options: AskOptions) => {
    let logger: Logger | null = null;
    try {
      const config = await new ConfigManager().load({ configPath: options.config });
      const runtime = createRuntime(config);
      logger = runtime.logger;

      const context: QuestionContext = {
        question: options.question,
        user: options.user,
        timestamp: options.time ?? isoNow(),
      };
      const result = await runtime.orchestrator.process(context, { deliver: options.deliver });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(result.answer);
        console.error('');
        console.error(formatRunSummary(result));
      }
      process.exitCode = exitCodeFor(result, options.deliver && runtime.channel !== null);
    } catch (err) {
      logger?.error({ err: formatError(err) }, 'Question failed');
      console.error(formatError(err));
      process.exitCode = 1;
    }
  });
