/**
 * rm -rf Protection Validator
 *
 * Flags destructive deletion commands that could wipe important
 * directories. Each part of a chained command is checked on its own.
 */

import type { CommandFinding, CommandValidator } from '../types.js';

const FORCE_RECURSIVE = '(-[a-zA-Z]*r[a-zA-Z]*f[a-zA-Z]*|-[a-zA-Z]*f[a-zA-Z]*r[a-zA-Z]*)';

// Patterns that indicate dangerous rm commands
const DANGEROUS_RM_PATTERNS = [
  // rm -rf / or rm -rf /*
  new RegExp(`rm\\s+${FORCE_RECURSIVE}\\s+\\/(\\s|$|\\*)`),
  // rm -rf ~
  new RegExp(`rm\\s+${FORCE_RECURSIVE}\\s+~(\\s|$|\\/)`),
  // rm -rf $HOME
  new RegExp(`rm\\s+${FORCE_RECURSIVE}\\s+\\$HOME(\\s|$|\\/)`),
  // rm -rf . or rm -rf ..
  new RegExp(`rm\\s+${FORCE_RECURSIVE}\\s+\\.\\.?(\\s|$)`),
  // rm -rf * (in any directory)
  new RegExp(`rm\\s+${FORCE_RECURSIVE}\\s+\\*(\\s|$)`),
];

const RECURSIVE_FLAG = /\s(-[a-zA-Z]*[rR][a-zA-Z]*|--recursive)(\s|$)/;

const RM_SEGMENT = /^(sudo\s+)?rm\s/;

// Protected directories that should never be deleted
const PROTECTED_PATHS = [
  '/',
  '/bin',
  '/boot',
  '/dev',
  '/etc',
  '/home',
  '/lib',
  '/lib64',
  '/opt',
  '/proc',
  '/root',
  '/run',
  '/sbin',
  '/srv',
  '/sys',
  '/tmp',
  '/usr',
  '/var',
  '/Applications',
  '/Library',
  '/System',
  '/Users',
  '/Volumes',
];

/**
 * Check if a path is protected
 */
export function isProtectedPath(path: string): boolean {
  const normalizedPath = path.replace(/(.)\/+$/, '$1'); // Remove trailing slashes, keep a bare '/'

  for (const protectedPath of PROTECTED_PATHS) {
    if (normalizedPath === protectedPath) return true;
    if (normalizedPath.startsWith(protectedPath + '/') &&
        normalizedPath.split('/').length <= 3) {
      return true; // Protect top-level subdirectories
    }
  }

  return false;
}

/**
 * Extract paths from one rm command
 */
function extractPaths(segment: string): string[] {
  const paths: string[] = [];

  // Remove the rm command and flags
  const match = segment.match(/rm\s+(-[a-zA-Z-]*\s+)*(.+)/);
  if (match && match[2]) {
    // Split by spaces, handling quoted strings
    const parts = match[2].match(/("[^"]*"|'[^']*'|\S+)/g) ?? [];
    for (const part of parts) {
      const path = part.replace(/^["']|["']$/g, '');
      if (!path.startsWith('-')) {
        paths.push(path);
      }
    }
  }

  return paths;
}

function checkSegment(segment: string): CommandFinding | null {
  for (const pattern of DANGEROUS_RM_PATTERNS) {
    if (pattern.test(segment)) {
      return {
        reason: 'Dangerous rm command that could delete critical system files',
        severity: 'critical',
        suggestions: [
          'Review the paths you are trying to delete',
          'Use more specific paths instead of wildcards',
        ],
      };
    }
  }

  for (const path of extractPaths(segment)) {
    if (isProtectedPath(path)) {
      return {
        reason: `Deletes protected path: ${path}`,
        severity: 'critical',
        suggestions: ['This path is protected to prevent accidental data loss'],
      };
    }
  }

  if (RECURSIVE_FLAG.test(segment)) {
    return {
      reason: 'Recursive deletion',
      severity: 'warning',
    };
  }

  return null;
}

/**
 * Validator for rm commands
 */
export const rmRfValidator: CommandValidator = (command) => {
  const segments = command
    .split(/&&|\|\||;|\|/)
    .map((part) => part.trim())
    .filter((part) => RM_SEGMENT.test(part));

  let warning: CommandFinding | null = null;
  for (const segment of segments) {
    const finding = checkSegment(segment);
    if (finding?.severity === 'critical') return finding;
    warning = warning ?? finding;
  }
  return warning;
};
