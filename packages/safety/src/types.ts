/**
 * Safety classifier types
 */

import type { SafetyVerdict, Severity } from '@cmdrecall/common';

export interface CommandFinding {
  reason: string;
  severity: Severity;
  suggestions?: string[];
}

/**
 * Inspects one shell command; null when it has nothing to report
 */
export type CommandValidator = (command: string) => CommandFinding | null;

export interface CommandRule {
  pattern: RegExp;
  reason: string;
  severity: Severity;
}

export interface SafetyHook {
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  priority: number;
  validator: CommandValidator;
}

export interface ClassifierConfig {
  enabled: boolean;
  hooks: SafetyHook[];
  /** Extra case-insensitive patterns, graded as errors */
  extraPatterns: string[];
  /** Exact commands never flagged */
  allowList: string[];
}

export interface HookFinding extends CommandFinding {
  hookId: string;
}

export interface SafetyReport extends SafetyVerdict {
  findings: HookFinding[];
  suggestions: string[];
  checksPerformed: string[];
}
