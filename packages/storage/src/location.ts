/**
 * Store location resolution
 *
 * Picks the first writable directory out of: configured dir, the user's
 * ~/.cmdrecall, then <tmp>/cmdrecall.
 */

import { resolve, join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { accessSync, constants, existsSync, mkdirSync } from 'node:fs';

export type LocationSource = 'configured' | 'home' | 'temp';

export type StoreLocation =
  | { kind: 'file'; source: LocationSource; directory: string; path: string }
  | { kind: 'unavailable'; reasons: string[] };

export interface LocationOptions {
  configuredDir?: string;
  homeDir?: string;
  tempDir?: string;
  databaseFile?: string;
}

export const DEFAULT_DIR_NAME = '.cmdrecall';

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(dir: string, home: string = homedir()): string {
  if (dir === '~') return home;
  if (dir.startsWith('~/')) return join(home, dir.slice(2));
  return dir;
}

/**
 * Create the directory if needed and confirm the database file can be written
 */
function checkWritable(directory: string, databaseFile: string): string | undefined {
  try {
    mkdirSync(directory, { recursive: true });
    accessSync(directory, constants.W_OK);
    const file = join(directory, databaseFile);
    if (existsSync(file)) {
      accessSync(file, constants.R_OK | constants.W_OK);
    }
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

export function resolveLocation(options: LocationOptions = {}): StoreLocation {
  const home = options.homeDir ?? homedir();
  const databaseFile = options.databaseFile ?? 'cache.db';

  const candidates: Array<{ source: LocationSource; directory: string }> = [];
  if (options.configuredDir) {
    candidates.push({ source: 'configured', directory: resolve(expandHome(options.configuredDir, home)) });
  }
  candidates.push({ source: 'home', directory: resolve(home, DEFAULT_DIR_NAME) });
  candidates.push({ source: 'temp', directory: resolve(options.tempDir ?? tmpdir(), 'cmdrecall') });

  const reasons: string[] = [];
  for (const candidate of candidates) {
    const problem = checkWritable(candidate.directory, databaseFile);
    if (problem === undefined) {
      return {
        kind: 'file',
        source: candidate.source,
        directory: candidate.directory,
        path: join(candidate.directory, databaseFile),
      };
    }
    reasons.push(`${candidate.source} (${candidate.directory}): ${problem}`);
  }

  return { kind: 'unavailable', reasons };
}
