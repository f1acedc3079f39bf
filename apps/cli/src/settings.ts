/**
 * Settings file loading
 *
 * --config wins; otherwise ~/.cmdrecall/settings.json, then ./.cmdrecall.json.
 * With no file at all the defaults apply.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { parseSettings, ValidationError, type CacheSettings } from '@cmdrecall/common';
import { DEFAULT_DIR_NAME } from '@cmdrecall/storage';

export interface SettingsSources {
  homeDir?: string;
  cwd?: string;
}

export function settingsCandidates(sources: SettingsSources = {}): string[] {
  return [
    join(sources.homeDir ?? homedir(), DEFAULT_DIR_NAME, 'settings.json'),
    join(sources.cwd ?? process.cwd(), '.cmdrecall.json'),
  ];
}

/**
 * Path of the settings file in effect, or undefined for defaults
 */
export function findSettingsFile(path?: string, sources: SettingsSources = {}): string | undefined {
  if (path) return resolve(sources.cwd ?? process.cwd(), path);
  return settingsCandidates(sources).find((candidate) => existsSync(candidate));
}

export function loadSettings(path?: string, sources: SettingsSources = {}): CacheSettings {
  const file = findSettingsFile(path, sources);
  if (!file) return parseSettings({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read settings file ${file}: ${message}`, { path: file });
  }
  return parseSettings(raw);
}
