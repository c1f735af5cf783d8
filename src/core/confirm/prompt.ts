// src/core/confirm/prompt.ts
import * as readline from 'node:readline/promises';
import { AccFetchError, ErrorCode } from '../errors.js';

export interface PromptAdapter {
  ask(question: string): Promise<string>;
}

/**
 * Reads answers line by line from one readline interface, opened on the
 * first question and kept until `close()`. Lines that arrive ahead of
 * their question stay queued for the next `ask`.
 */
export class ReadlinePrompt implements PromptAdapter {
  private rl: readline.Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(question: string): Promise<string> {
    const lines = this.getLines();
    this.output.write(question);

    const next = await lines.next();
    if (next.done) {
      throw new AccFetchError(
        ErrorCode.USER_REJECTED_PARSING,
        'Input closed before the parsing results were confirmed'
      );
    }
    return next.value;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }

  private getLines(): AsyncIterator<string> {
    if (!this.lines) {
      const rl = readline.createInterface({ input: this.input, terminal: false });
      this.rl = rl;
      this.lines = rl[Symbol.asyncIterator]();
    }
    return this.lines;
  }
}
