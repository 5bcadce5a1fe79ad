import * as readline from 'node:readline';
import type { Prompter } from './types.js';

/**
 * Console prompter over node:readline.
 * Lines that arrive before a question is asked are queued, so piped answers
 * are consumed in order.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines: string[] = [];
  private waiting?: (answer: string | null) => void;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.output = output;
    this.rl = readline.createInterface({ input, output, terminal: false });
    this.rl.on('line', (line) => {
      if (this.waiting) {
        this.resolveWaiting(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      this.resolveWaiting(null);
    });
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }

  private resolveWaiting(answer: string | null): void {
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.(answer);
  }
}
