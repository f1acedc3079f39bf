/**
 * Safety Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DangerousCommandClassifier } from '@cmdrecall/safety';
import { loadSettings } from '../settings.js';
import { globalOptions, reportError } from './shared.js';

interface JsonOptions {
  json?: boolean;
}

function classifierFor(command: Command): DangerousCommandClassifier {
  return DangerousCommandClassifier.fromSettings(loadSettings(globalOptions(command).config).safety);
}

export function safetyCommands(): Command {
  const safety = new Command('safety')
    .description('Dangerous command checks');

  safety
    .command('status')
    .description('Show safety check status')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOptions, command: Command) => {
      try {
        const status = classifierFor(command).getStatus();

        if (options.json) {
          console.log(JSON.stringify(status, null, 2));
          return;
        }

        console.log(chalk.bold('\nSafety Checks:\n'));

        for (const hook of status.hooks) {
          const statusIcon = hook.enabled ? chalk.green('✓') : chalk.red('✗');
          console.log(`  ${statusIcon} ${chalk.cyan(hook.id.padEnd(20))} ${chalk.gray(hook.description)}`);
        }
        console.log();
      } catch (error) {
        reportError(error, globalOptions(command).verbose);
      }
    });

  safety
    .command('check <command>')
    .description('Check whether a command is dangerous')
    .option('--json', 'Output as JSON')
    .action(async (shellCommand: string, options: JsonOptions, command: Command) => {
      try {
        const report = classifierFor(command).inspect(shellCommand);

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }

        if (!report.dangerous) {
          console.log(chalk.green('✓ No dangerous patterns found'));
          return;
        }

        console.log(chalk.red(`✗ Dangerous (${report.severity})`));
        for (const finding of report.findings) {
          console.log(`  - ${chalk.gray(`[${finding.hookId}]`)} ${finding.reason}`);
        }
        if (report.suggestions.length > 0) {
          console.log(chalk.yellow('\nSuggestions:'));
          for (const suggestion of report.suggestions) {
            console.log(`  - ${suggestion}`);
          }
        }
        console.log();
      } catch (error) {
        reportError(error, globalOptions(command).verbose);
      }
    });

  return safety;
}
