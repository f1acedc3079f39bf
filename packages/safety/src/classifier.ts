/**
 * Dangerous command classification
 */

import type { SafetySettings, SafetyClassifier, SafetyVerdict } from '@cmdrecall/common';
import type { ClassifierConfig, HookFinding, SafetyHook, SafetyReport } from './types.js';
import { compareSeverity } from './severity.js';
import { rmRfValidator } from './validators/rm-rf.js';
import { dangerousCommandValidator } from './validators/dangerous-commands.js';
import { createPatternValidator } from './validators/custom-patterns.js';

/**
 * Default hooks, freshly built so callers can toggle them independently
 */
export function defaultHooks(): SafetyHook[] {
  return [
    {
      id: 'rm-rf',
      name: 'rm -rf Protection',
      description: 'Flags destructive recursive deletion commands',
      enabled: true,
      priority: 100,
      validator: rmRfValidator,
    },
    {
      id: 'dangerous-commands',
      name: 'Dangerous Command Rules',
      description: 'Flags known dangerous shell commands',
      enabled: true,
      priority: 100,
      validator: dangerousCommandValidator,
    },
  ];
}

export class DangerousCommandClassifier implements SafetyClassifier {
  private config: ClassifierConfig;
  private hooks: Map<string, SafetyHook>;
  private allowList: Set<string>;

  constructor(config?: Partial<ClassifierConfig>) {
    this.config = {
      enabled: true,
      hooks: defaultHooks(),
      extraPatterns: [],
      allowList: [],
      ...config,
    };

    this.hooks = new Map();
    for (const hook of this.config.hooks) {
      this.hooks.set(hook.id, hook);
    }
    if (this.config.extraPatterns.length > 0) {
      this.addHook({
        id: 'custom-patterns',
        name: 'Configured Patterns',
        description: 'Flags commands matching configured patterns',
        enabled: true,
        priority: 50,
        validator: createPatternValidator(this.config.extraPatterns),
      });
    }
    this.allowList = new Set(this.config.allowList.map((command) => command.trim()));
  }

  /**
   * Build a classifier from the `safety` section of the cache settings
   */
  static fromSettings(settings: SafetySettings): DangerousCommandClassifier {
    return new DangerousCommandClassifier({
      extraPatterns: settings.extraPatterns,
      allowList: settings.allowList,
    });
  }

  classify(command: string): SafetyVerdict {
    const { dangerous, severity, reason } = this.inspect(command);
    return { dangerous, severity, reason };
  }

  /**
   * Run every enabled hook and report all findings, most severe first
   */
  inspect(command: string): SafetyReport {
    const trimmed = command.trim();
    if (!this.config.enabled || trimmed === '' || this.allowList.has(trimmed)) {
      return { dangerous: false, findings: [], suggestions: [], checksPerformed: [] };
    }

    const checksPerformed: string[] = [];
    const findings: HookFinding[] = [];
    const sortedHooks = Array.from(this.hooks.values())
      .filter(h => h.enabled)
      .sort((a, b) => b.priority - a.priority);

    for (const hook of sortedHooks) {
      checksPerformed.push(hook.id);

      try {
        const finding = hook.validator(trimmed);
        if (finding) findings.push({ hookId: hook.id, ...finding });
      } catch (error) {
        // A broken check must not let the command through
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[SAFETY] Hook ${hook.id} threw error:`, message);
        findings.push({ hookId: hook.id, reason: `Safety check failed: ${message}`, severity: 'critical' });
      }
    }

    findings.sort((a, b) => compareSeverity(b.severity, a.severity));
    const worst = findings[0];

    return {
      dangerous: worst !== undefined,
      severity: worst?.severity,
      reason: worst?.reason,
      findings,
      suggestions: [...new Set(findings.flatMap((f) => f.suggestions ?? []))],
      checksPerformed,
    };
  }

  enableHook(hookId: string): boolean {
    const hook = this.hooks.get(hookId);
    if (hook) {
      hook.enabled = true;
      return true;
    }
    return false;
  }

  disableHook(hookId: string): boolean {
    const hook = this.hooks.get(hookId);
    if (hook) {
      hook.enabled = false;
      return true;
    }
    return false;
  }

  addHook(hook: SafetyHook): void {
    this.hooks.set(hook.id, hook);
  }

  removeHook(hookId: string): boolean {
    return this.hooks.delete(hookId);
  }

  getHooks(): SafetyHook[] {
    return Array.from(this.hooks.values());
  }

  getStatus(): {
    enabled: boolean;
    activeHooks: number;
    totalHooks: number;
    hooks: { id: string; name: string; description: string; enabled: boolean }[];
  } {
    const hooks = Array.from(this.hooks.values());
    return {
      enabled: this.config.enabled,
      activeHooks: hooks.filter(h => h.enabled).length,
      totalHooks: hooks.length,
      hooks: hooks.map(h => ({
        id: h.id,
        name: h.name,
        description: h.description,
        enabled: h.enabled,
      })),
    };
  }

  enable(): void {
    this.config.enabled = true;
  }

  /**
   * Disable all checks: every command is then reported safe
   */
  disable(): void {
    this.config.enabled = false;
    console.warn('[SAFETY] All safety checks have been disabled!');
  }
}
