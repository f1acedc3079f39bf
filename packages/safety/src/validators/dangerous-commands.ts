/**
 * Dangerous Command Rules
 *
 * Known shell commands that could cause system damage or data loss,
 * graded by how hard the damage is to undo.
 */

import type { CommandFinding, CommandRule, CommandValidator } from '../types.js';
import { compareSeverity } from '../severity.js';

export const DANGEROUS_COMMAND_RULES: CommandRule[] = [
  // System destruction
  { pattern: /\bmkfs(\.\w+)?\s/, reason: 'Formatting filesystem', severity: 'critical' },
  { pattern: /\bdd\s+.*of=\/dev\//, reason: 'Writing directly to a device', severity: 'critical' },
  { pattern: />\s*\/dev\/(sd|hd|nvme|disk)/, reason: 'Redirecting output onto a disk device', severity: 'critical' },
  { pattern: /\bformat\s+[a-z]:/, reason: 'Formatting a Windows drive', severity: 'critical' },

  // Fork bombs and resource exhaustion
  { pattern: /:\(\)\s*\{.*:\|:.*\}/, reason: 'Fork bomb detected', severity: 'critical' },
  { pattern: /\$\{:\|:&\}/, reason: 'Fork bomb detected', severity: 'critical' },
  { pattern: /while\s+true.*do.*done/, reason: 'Potential infinite loop', severity: 'warning' },

  // Power and process control
  { pattern: /\bshutdown\b/, reason: 'Shutting down the system', severity: 'critical' },
  { pattern: /\breboot\b/, reason: 'Rebooting the system', severity: 'critical' },
  { pattern: /\bhalt\b/, reason: 'Halting the system', severity: 'critical' },
  { pattern: /\bkill\s+-9\s+1(\s|$)/, reason: 'Killing the init process', severity: 'critical' },
  { pattern: /\bkillall\s/, reason: 'Killing multiple processes', severity: 'error' },
  { pattern: /\bpkill\s/, reason: 'Pattern-based process killing', severity: 'warning' },
  { pattern: /\bkill\s+-9/, reason: 'Force killing process', severity: 'warning' },

  // Permissions
  { pattern: /\bchmod\s+(-r\s+)?777\s+\//, reason: 'Setting world-writable permissions on a system path', severity: 'critical' },
  { pattern: /\bchmod\s+(-r\s+)?777\b/, reason: 'Setting world-writable permissions', severity: 'error' },
  { pattern: /\bchown\s+.*:.*\s+\//, reason: 'Changing ownership of system paths', severity: 'error' },
  { pattern: /\bchmod\s+.*\+s/, reason: 'Setting setuid/setgid bit', severity: 'warning' },

  // Deletion beyond rm
  { pattern: /\bsudo\s+rm\s/, reason: 'Deleting files with elevated privileges', severity: 'error' },
  { pattern: /\bdel\s+.*\*/, reason: 'Deleting files by wildcard', severity: 'error' },
  { pattern: /\bmv\s+.*\s+\/dev\/null/, reason: 'Moving files to /dev/null', severity: 'error' },
  { pattern: /\brmdir\s+.*\//, reason: 'Removing directories by path', severity: 'warning' },

  // Network attacks
  { pattern: /\bnc\s+-l.*-e\s*(\/bin\/sh|\/bin\/bash|sh|bash)/, reason: 'Network backdoor', severity: 'critical' },
  { pattern: /bash\s+-i\s+>&\s+\/dev\/tcp/, reason: 'Reverse shell', severity: 'critical' },

  // Remote code
  { pattern: /\b(curl|wget)\b.*\|\s*(sudo\s+)?(ba|z)?sh\b/, reason: 'Piping remote script to shell', severity: 'critical' },

  // History manipulation
  { pattern: /\bhistory\s+-c/, reason: 'Clearing shell history', severity: 'error' },
  { pattern: />\s*~\/\.bash_history/, reason: 'Clearing bash history', severity: 'error' },
  { pattern: /\bunset\s+histfile/, reason: 'Disabling history', severity: 'error' },

  // Kernel manipulation
  { pattern: /\binsmod\s/, reason: 'Loading kernel module', severity: 'critical' },
  { pattern: /\bmodprobe\s/, reason: 'Loading kernel module', severity: 'critical' },
  { pattern: /\brmmod\s/, reason: 'Removing kernel module', severity: 'critical' },

  // Package managers
  { pattern: /\bapt(-get)?\s+.*remove.*--purge.*\*/, reason: 'Purging packages by wildcard', severity: 'error' },
  { pattern: /\byum\s+.*remove.*\*/, reason: 'Removing packages by wildcard', severity: 'error' },
  { pattern: /\bpip\s+.*uninstall.*-y.*\*/, reason: 'Uninstalling packages by wildcard', severity: 'error' },

  // Privileges and services
  { pattern: /\bsudo\s/, reason: 'Elevated privileges requested', severity: 'warning' },
  { pattern: /\bsu\s+-/, reason: 'Switching to root user', severity: 'warning' },
  { pattern: /\bcrontab\s+-(e|r)/, reason: 'Editing cron jobs', severity: 'warning' },
  { pattern: /\bsystemctl\s+(stop|disable|mask)/, reason: 'Stopping/disabling services', severity: 'warning' },
  { pattern: /\b(iptables|ufw)\s/, reason: 'Modifying firewall rules', severity: 'warning' },
];

/**
 * Most severe rule matching the command; the earliest rule wins a tie
 */
export function matchRules(command: string, rules: CommandRule[]): CommandRule | null {
  let worst: CommandRule | null = null;
  for (const rule of rules) {
    if (rule.pattern.test(command) && (!worst || compareSeverity(rule.severity, worst.severity) > 0)) {
      worst = rule;
    }
  }
  return worst;
}

/**
 * Validator for known dangerous commands
 */
export const dangerousCommandValidator: CommandValidator = (raw): CommandFinding | null => {
  const command = raw.trim().toLowerCase();

  const rule = matchRules(command, DANGEROUS_COMMAND_RULES);
  if (rule?.severity === 'critical') {
    return {
      reason: rule.reason,
      severity: 'critical',
      suggestions: ['This command can cause irreversible damage; review it before running'],
    };
  }

  // Check for encoded/obfuscated commands
  if (command.includes('base64') && (command.includes('|') || command.includes('`'))) {
    return {
      reason: 'Executes base64-encoded content',
      severity: 'critical',
      suggestions: ['Decode and review the command before running'],
    };
  }

  // Check for eval with variables (could hide malicious content)
  if (/\beval\s/.test(command) && command.includes('$')) {
    return {
      reason: 'eval with variables could execute hidden commands',
      severity: 'error',
      suggestions: ['Avoid using eval with dynamic content'],
    };
  }

  return rule ? { reason: rule.reason, severity: rule.severity } : null;
};
