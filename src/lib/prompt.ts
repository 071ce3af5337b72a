/**
 * Interactive prompts
 * Commands ask through the Prompter interface so tests and --force runs
 * never touch the terminal.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

export interface Prompter {
  /** Yes/no question, "no" by default. End of input counts as "no". */
  confirm(message: string): Promise<boolean>;
  /**
   * Ask until the answer is one of `choices`.
   * @returns the answer, or null when input ended first
   */
  choose(message: string, choices: readonly string[]): Promise<string | null>;
  close(): void;
}

/**
 * Line-based prompter over a readable stream. Lines that arrive before a
 * question is asked are queued, so piped answers are not lost.
 */
export class ReadlinePrompter implements Prompter {
  private input: Readable;
  private output: Writable;
  private rl: Interface | null = null;
  private lines: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async confirm(message: string): Promise<boolean> {
    const answer = await this.choose(message, ['y', 'n'], 'n');
    return answer === 'y';
  }

  async choose(message: string, choices: readonly string[], fallback?: string): Promise<string | null> {
    const suffix = fallback === undefined ? '' : ` (${fallback})`;
    const question = `${message} [${choices.join('/')}]${suffix}: `;

    for (;;) {
      const line = await this.ask(question);
      if (line === null) {
        this.output.write('\n');
        return fallback ?? null;
      }

      const answer = line.trim().toLowerCase();
      if (answer === '' && fallback !== undefined) {
        return fallback;
      }
      if (choices.includes(answer)) {
        return answer;
      }
      this.output.write(`Please select one of the available options\n`);
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private ask(question: string): Promise<string | null> {
    this.output.write(question);
    this.open();

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  private open(): void {
    if (this.rl || this.ended) {
      return;
    }

    const rl = createInterface({ input: this.input, terminal: false });
    rl.on('line', (line) => this.deliver(line));
    rl.on('close', () => {
      this.ended = true;
      this.rl = null;
      this.deliver(null);
    });
    this.rl = rl;
  }

  private deliver(line: string | null): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
    } else if (line !== null) {
      this.lines.push(line);
    }
  }
}
