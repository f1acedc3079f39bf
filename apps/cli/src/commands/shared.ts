/**
 * Helpers shared by the command groups
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { createCacheContext, type CacheContext, type CacheContextOptions } from '@cmdrecall/cache';
import { wrapError } from '@cmdrecall/common';
import { loadSettings } from '../settings.js';

export interface GlobalOptions {
  config?: string;
  verbose: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  const { config, verbose } = command.optsWithGlobals();
  return {
    config: typeof config === 'string' ? config : undefined,
    verbose: verbose === true,
  };
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseDays(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number of days.');
  }
  return parsed;
}

export function percent(value: number): string {
  return `${(value * 100).toFixed(0)}%`;
}

export function reportError(error: unknown, verbose = false): void {
  const wrapped = wrapError(error);
  console.error(chalk.red(`Error: ${wrapped.message}`));
  if (verbose) {
    console.error(chalk.gray(JSON.stringify(wrapped.toJSON(), null, 2)));
  }
  process.exitCode = 1;
}

/**
 * Open a cache context from the global options, run fn, always close
 */
export async function withCache(
  command: Command,
  fn: (cache: CacheContext) => Promise<void>,
  extra: Omit<CacheContextOptions, 'settings' | 'verbose'> = {}
): Promise<void> {
  const { config, verbose } = globalOptions(command);
  let cache: CacheContext | undefined;
  try {
    cache = createCacheContext({ ...extra, settings: loadSettings(config), verbose });
    await fn(cache);
  } catch (error) {
    reportError(error, verbose);
  } finally {
    cache?.close();
  }
}
