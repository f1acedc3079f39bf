/**
 * Ask Command
 *
 * Runs one request through the cache: reuse, confirm or translate. The
 * chosen command is the only thing written to stdout.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ReadlinePrompt } from '../prompt.js';
import { PatternTranslator } from '../translator.js';
import { parseCount, withCache } from './shared.js';

interface AskOptions {
  timeout: number;
  json?: boolean;
}

export function askCommand(): Command {
  return new Command('ask')
    .description('Find or translate a shell command for a request')
    .argument('<request...>', 'What you want to do, in plain words')
    .option('-t, --timeout <seconds>', 'Seconds to wait for an answer', parseCount, 30)
    .option('--json', 'Output the full outcome as JSON')
    .action(async (parts: string[], options: AskOptions, command: Command) => {
      await withCache(
        command,
        async (ctx) => {
          const outcome = await ctx.orchestrator.run(parts.join(' '));

          if (options.json) {
            console.log(JSON.stringify(outcome, null, 2));
            return;
          }
          if (outcome.command === null) {
            console.error(chalk.yellow(outcome.answer === 'timedOut' ? 'No answer; nothing selected.' : 'Nothing selected.'));
            process.exitCode = 1;
            return;
          }
          console.log(outcome.command);
        },
        {
          translator: new PatternTranslator(),
          prompt: new ReadlinePrompt({ timeoutMs: options.timeout * 1000 }),
        }
      );
    });
}
