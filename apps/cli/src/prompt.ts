/**
 * Terminal confirmation prompt
 *
 * Shows the proposed command on stderr and waits for y/N. No answer within
 * the timeout, or a closed input, counts as timedOut.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { ConfirmationAnswer, ConfirmationPrompt, ConfirmationRequest } from '@cmdrecall/common';

export interface ReadlinePromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  timeoutMs?: number;
}

const SOURCE_LABELS: Record<ConfirmationRequest['source'], string> = {
  exact: 'cached',
  similar: 'similar request',
  translation: 'translated',
};

export class ReadlinePrompt implements ConfirmationPrompt {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly timeoutMs: number;

  constructor(options: ReadlinePromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async confirm(request: ConfirmationRequest): Promise<ConfirmationAnswer> {
    this.output.write(`${this.describe(request).join('\n')}\n`);

    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });

    return new Promise<ConfirmationAnswer>((resolve) => {
      let settled = false;
      const settle = (answer: ConfirmationAnswer): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        rl.close();
        resolve(answer);
      };

      const timer = setTimeout(() => settle('timedOut'), this.timeoutMs);
      rl.on('close', () => settle('timedOut'));
      rl.question(chalk.dim('Use this command? [y/N] '), (answer) => {
        settle(/^y(es)?$/i.test(answer.trim()) ? 'confirmed' : 'rejected');
      });
    });
  }

  private describe(request: ConfirmationRequest): string[] {
    const lines = [`${chalk.cyan(request.command)} ${chalk.gray(`(${SOURCE_LABELS[request.source]})`)}`];
    if (request.source !== 'translation') {
      lines.push(chalk.gray(`confidence ${(request.confidence * 100).toFixed(0)}%`));
    }
    if (request.safety.dangerous) {
      lines.push(chalk.red(`⚠ ${request.safety.severity}: ${request.safety.reason}`));
    }
    return lines;
  }
}
