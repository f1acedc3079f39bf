/**
 * Cache Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Decision } from '@cmdrecall/cache';
import { formatTimestamp, truncate } from '@cmdrecall/common';
import { parseCount, parseDays, percent, withCache } from './shared.js';

interface JsonOptions {
  json?: boolean;
}

interface CleanupOptions {
  maxAgeDays?: number;
  sizeLimit?: number;
}

interface ClearOptions {
  purgeFeedback?: boolean;
}

interface HistoryOptions extends JsonOptions {
  limit: number;
}

export function describeDecision(decision: Decision): string[] {
  switch (decision.action) {
    case 'AutoUse':
      return [
        `${chalk.green('AutoUse')}  ${chalk.cyan(decision.entry.command)}`,
        chalk.gray(`  confidence ${percent(decision.confidence)}`),
      ];

    case 'Confirm': {
      const lines = [
        `${chalk.yellow(`Confirm (${decision.source})`)}  ${chalk.cyan(decision.entry.command)}`,
        chalk.gray(`  confidence ${percent(decision.confidence)}  similarity ${percent(decision.similarity)}`),
      ];
      if (decision.safety.dangerous) {
        lines.push(chalk.red(`  ⚠ ${decision.safety.severity}: ${decision.safety.reason}`));
      }
      return lines;
    }

    case 'Translate': {
      const lines = [chalk.magenta(`Translate (${decision.reason})`)];
      if (decision.entry) {
        lines.push(chalk.gray(`  cached ${decision.entry.command} at confidence ${percent(decision.confidence)}`));
      }
      return lines;
    }
  }
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function cacheCommands(): Command {
  const cache = new Command('cache')
    .description('Command cache maintenance');

  cache
    .command('status')
    .description('Show store statistics and cache health')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const stats = await ctx.database.stats();
        const distribution = await ctx.model.distribution();
        const needsRecalculation = await ctx.model.needsRecalculation();
        const health = ctx.controller.health();

        if (options.json) {
          console.log(JSON.stringify({ stats, distribution, needsRecalculation, health }, null, 2));
          return;
        }

        console.log(chalk.bold('\nCache store:\n'));
        console.log(`  ${chalk.cyan('Path'.padEnd(12))} ${stats.path}`);
        console.log(`  ${chalk.cyan('Size'.padEnd(12))} ${formatBytes(stats.sizeBytes)}`);
        console.log(`  ${chalk.cyan('Schema'.padEnd(12))} v${stats.schemaVersion}`);
        console.log(`  ${chalk.cyan('Entries'.padEnd(12))} ${stats.cacheEntries}`);
        console.log(`  ${chalk.cyan('Feedback'.padEnd(12))} ${stats.feedbackEvents}`);

        console.log(chalk.bold('\nConfidence:\n'));
        console.log(`  ${'very high'.padEnd(12)} ${distribution.veryHigh}`);
        console.log(`  ${'high'.padEnd(12)} ${distribution.high}`);
        console.log(`  ${'medium'.padEnd(12)} ${distribution.medium}`);
        console.log(`  ${'low'.padEnd(12)} ${distribution.low}`);
        console.log(chalk.gray(`  average ${distribution.averageConfidence.toFixed(3)}`));

        if (needsRecalculation) {
          console.log(chalk.yellow('\nScores were computed with other weights; run "cmdrecall cache recalculate".'));
        }
        console.log();
      });
    });

  cache
    .command('lookup <query...>')
    .description('Show what would be done for a query, without asking or translating')
    .option('--json', 'Output as JSON')
    .action(async (parts: string[], options: JsonOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const decision = await ctx.orchestrator.decide(parts.join(' '));

        if (options.json) {
          console.log(JSON.stringify(decision, null, 2));
          return;
        }
        for (const line of describeDecision(decision)) {
          console.log(line);
        }
      });
    });

  cache
    .command('cleanup')
    .description('Remove expired entries and evict down to the size limit')
    .option('-a, --max-age-days <days>', 'Remove entries unused for this many days', parseDays)
    .option('-s, --size-limit <n>', 'Keep at most this many entries', parseCount)
    .action(async (options: CleanupOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const result = await ctx.manager.cleanup(options.maxAgeDays, options.sizeLimit);
        console.log(chalk.green(
          `Removed ${result.removed} entries (${result.expired} expired, ${result.evicted} evicted); ${result.remaining} remain`
        ));
      });
    });

  cache
    .command('recalculate')
    .description('Recompute every stored score with the current weights')
    .action(async (_options: JsonOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const result = await ctx.model.recalculateAll();
        console.log(chalk.green(`Recalculated ${result.updated} of ${result.total} entries`));
        if (result.failed > 0) {
          console.log(chalk.yellow(`${result.failed} entries failed; run again to retry them`));
          process.exitCode = 1;
        }
      });
    });

  cache
    .command('backup [destination]')
    .description('Copy the cache database')
    .action(async (destination: string | undefined, _options: JsonOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const target = await ctx.database.backup(destination);
        console.log(chalk.green(`Backup written to ${target}`));
      });
    });

  cache
    .command('clear')
    .description('Delete every cached entry')
    .option('--purge-feedback', 'Also delete the feedback log')
    .action(async (options: ClearOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const result = await ctx.manager.clear({ purgeFeedback: options.purgeFeedback === true });
        const events = options.purgeFeedback ? ` and ${result.feedbackEvents} feedback events` : '';
        console.log(chalk.yellow(`Cleared ${result.entries} entries${events}`));
      });
    });

  cache
    .command('history <query...>')
    .description('Show recorded feedback for a query')
    .option('-l, --limit <n>', 'Maximum number of events', parseCount, 20)
    .option('--json', 'Output as JSON')
    .action(async (parts: string[], options: HistoryOptions, command: Command) => {
      await withCache(command, async (ctx) => {
        const events = await ctx.model.feedbackHistory(ctx.manager.hash(parts.join(' ')), options.limit);

        if (options.json) {
          console.log(JSON.stringify(events, null, 2));
          return;
        }
        if (events.length === 0) {
          console.log(chalk.yellow('No feedback recorded.'));
          return;
        }
        for (const event of events) {
          const action = event.action === 'confirm' ? chalk.green('confirm') : chalk.red('reject ');
          console.log(`${chalk.gray(formatTimestamp(event.timestamp))} ${action} ${truncate(event.command, 80)}`);
        }
      });
    });

  return cache;
}
