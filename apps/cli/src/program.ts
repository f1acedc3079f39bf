/**
 * cmdrecall CLI program
 */

import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { cacheCommands } from './commands/cache.js';
import { safetyCommands } from './commands/safety.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cmdrecall')
    .description('Confidence-weighted cache of shell commands for natural-language requests')
    .version('0.1.0')
    .option('-c, --config <path>', 'Settings file (JSON)')
    .option('-v, --verbose', 'Log store activity');

  // Register command groups
  program.addCommand(askCommand());
  program.addCommand(cacheCommands());
  program.addCommand(safetyCommands());

  return program;
}

export { loadSettings, findSettingsFile, settingsCandidates } from './settings.js';
export type { SettingsSources } from './settings.js';
export { PatternTranslator, DEFAULT_PATTERNS } from './translator.js';
export type { TranslationPattern } from './translator.js';
export { ReadlinePrompt } from './prompt.js';
export type { ReadlinePromptOptions } from './prompt.js';
