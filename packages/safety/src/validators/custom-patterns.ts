/**
 * User-supplied dangerous patterns
 */

import { ValidationError } from '@cmdrecall/common';
import type { CommandRule, CommandValidator } from '../types.js';
import { matchRules } from './dangerous-commands.js';

/**
 * Build a validator from case-insensitive regular expression sources.
 * Throws ValidationError for a source that does not compile.
 */
export function createPatternValidator(sources: string[]): CommandValidator {
  const rules = sources.map((source): CommandRule => {
    try {
      return {
        pattern: new RegExp(source, 'i'),
        reason: `Matches configured pattern /${source}/`,
        severity: 'error',
      };
    } catch (error) {
      throw new ValidationError(`Invalid dangerous-command pattern: ${source}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return (command) => {
    const rule = matchRules(command, rules);
    return rule ? { reason: rule.reason, severity: rule.severity } : null;
  };
}
