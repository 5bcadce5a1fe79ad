/**
 * Prompter that replays canned answers and records the questions asked.
 * Runs out of answers like a closed stdin: ask() resolves null.
 */
import type { Prompter } from '../../src/core/inputs/types.js';

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}
