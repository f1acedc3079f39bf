/**
 * Safety Commands Tests
 */

import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { tempPath } from '../../../../tests/helpers/storage-test-helper.js';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    dim: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
  },
}));

import { safetyCommands } from './safety.js';
import { createProgram } from '../program.js';

describe('Safety Commands', () => {
  let safety: Command;

  beforeEach(() => {
    safety = safetyCommands();
  });

  describe('Command Structure', () => {
    it('creates safety parent command', () => {
      expect(safety.name()).toBe('safety');
      expect(safety.description()).toBe('Dangerous command checks');
    });

    it('has status subcommand', () => {
      const status = safety.commands.find(c => c.name() === 'status');
      expect(status).toBeDefined();
      expect(status?.description()).toBe('Show safety check status');
    });

    it('has check subcommand', () => {
      const check = safety.commands.find(c => c.name() === 'check');
      expect(check).toBeDefined();
      expect(check?.description()).toBe('Check whether a command is dangerous');
    });

    it('has 2 subcommands', () => {
      expect(safety.commands.length).toBe(2);
    });
  });

  describe('Check Command Options', () => {
    it('requires command argument', () => {
      const check = safety.commands.find(c => c.name() === 'check');
      expect(check?.registeredArguments.length).toBe(1);
    });

    it('has json output option', () => {
      const check = safety.commands.find(c => c.name() === 'check');
      expect(check?.options.map(o => o.long)).toContain('--json');
    });
  });

  describe('Running checks', () => {
    let dir: string;
    let configPath: string;
    let log: MockInstance<typeof console.log>;

    async function run(...args: string[]): Promise<void> {
      await createProgram().exitOverride().parseAsync(['--config', configPath, ...args], { from: 'user' });
    }

    function logged(): unknown[] {
      return log.mock.calls.map(call => call[0]);
    }

    beforeEach(() => {
      dir = tempPath('cmdrecall-safety-cli');
      fs.mkdirSync(dir, { recursive: true });
      configPath = path.join(dir, 'settings.json');
      fs.writeFileSync(configPath, JSON.stringify({ safety: { extraPatterns: ['^kubectl delete'] } }));
      log = vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
      process.exitCode = undefined;
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('passes a harmless command', async () => {
      await run('safety', 'check', 'ls -la');

      expect(logged()).toEqual(['✓ No dangerous patterns found']);
    });

    it('lists findings for a destructive command', async () => {
      await run('safety', 'check', 'rm -rf /');

      expect(logged().slice(0, 2)).toEqual([
        '✗ Dangerous (critical)',
        '  - [rm-rf] Dangerous rm command that could delete critical system files',
      ]);
    });

    it('applies configured patterns', async () => {
      await run('safety', 'check', 'kubectl delete pod web');

      expect(logged()).toEqual([
        '✗ Dangerous (error)',
        '  - [custom-patterns] Matches configured pattern /^kubectl delete/',
        undefined,
      ]);
    });

    it('reports the configured hooks as JSON', async () => {
      await run('safety', 'status', '--json');

      const status = JSON.parse(String(logged()[0]));
      expect(status.hooks.map((h: { id: string }) => h.id)).toEqual(['rm-rf', 'dangerous-commands', 'custom-patterns']);
      expect(status.activeHooks).toBe(3);
    });
  });
});
