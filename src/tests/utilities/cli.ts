/**
 * In-process stand-ins for the terminal used by the CLI tests
 */

import { EndOfInputError, type CliOutput, type Prompt } from '../../cli/io';

export class CapturedOutput implements CliOutput {
  logs: string[] = [];
  warnings: string[] = [];
  errors: string[] = [];

  log(message: string): void {
    this.logs.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export class ScriptedPrompt implements Prompt {
  questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async question(query: string): Promise<string> {
    this.questions.push(query);
    const next = this.answers.shift();
    if (next === undefined) {
      throw new EndOfInputError(query);
    }
    return next;
  }

  close(): void {
    this.closed = true;
  }
}
