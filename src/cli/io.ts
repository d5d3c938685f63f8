/**
 * Console seams for the CLI, so tests can capture output and script answers
 */

import { createInterface, type Interface } from 'readline';

export interface CliOutput {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Rejects with EndOfInputError once no more answers can arrive
 */
export interface Prompt {
  question(query: string): Promise<string>;
  close(): void;
}

export class EndOfInputError extends Error {
  constructor(query: string) {
    super(`Input ended while waiting for: ${query.trim()}`);
    this.name = 'EndOfInputError';
  }
}

export const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Prompt over a line stream. Every answer comes from one async line iterator,
 * which buffers lines that arrive before the next question is asked.
 */
export class LinePrompt implements Prompt {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async question(query: string): Promise<string> {
    this.output.write(query);
    const next = await this.lines.next();
    if (next.done) {
      throw new EndOfInputError(query);
    }
    return next.value;
  }

  close(): void {
    this.rl.close();
  }
}
