/**
 * @cmdrecall/safety - Flags shell commands that should never run unasked
 *
 * Covers:
 * - Destructive deletion (rm -rf on system paths, wildcards, home)
 * - Disk formatting and raw device writes
 * - Shutdown, reboot and process-wide kills
 * - Remote scripts piped into a shell, reverse shells, obfuscated commands
 */

export * from './classifier.js';
export * from './validators/index.js';
export * from './types.js';
