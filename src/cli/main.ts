/**
 * two-sample-stats command line
 */

import { parseArgs } from 'util';
import { isStatsError } from '../core/errors';
import { runIndependentSamplesTTest, computePearsonR } from '../inference';
import { parseSampleInput, readSamplesFile } from './samples';
import { formatCorrelationResult, formatIndependentSamplesReport, toJson } from './format';
import { runInteractive } from './interactive';
import { resolveAnalysisOptions, type AnalysisOptions } from '../config/options';
import { EndOfInputError, type CliOutput, type Prompt } from './io';
import { VERSION } from '../version';


export const HELP = `
two-sample-stats - Levene-checked t-test and Pearson correlation

Usage:
  two-sample-stats                          Interactive menu
  two-sample-stats ttest --a <nums> --b <nums> [options]
  two-sample-stats correlation --a <nums> --b <nums> [options]
  two-sample-stats <command> --file <path>

Options:
  -a, --a <nums>        Sample A, numbers separated by commas
  -b, --b <nums>        Sample B, numbers separated by commas
  -f, --file <path>     Read the samples from the first two lines of a file
      --alpha <p>       Significance level for Levene's test (default 0.05)
      --center <c>      Levene centre: median, mean or trimmed (default median)
      --json            Print the result record as JSON
  -v, --version         Show version
  -h, --help            Show this help
`;

export type Command = 'ttest' | 'correlation';

export interface CliOptions {
  command?: Command;
  a?: string;
  b?: string;
  file?: string;
  alpha?: string;
  center?: string;
  json: boolean;
  version: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return value === 'ttest' || value === 'correlation';
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        a: { type: 'string', short: 'a' },
        b: { type: 'string', short: 'b' },
        file: { type: 'string', short: 'f' },
        alpha: { type: 'string' },
        center: { type: 'string' },
        json: { type: 'boolean', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseRawArgs(argv);
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  let command: Command | undefined;
  const name = positionals[0];
  if (name !== undefined) {
    if (!isCommand(name)) {
      throw new UsageError(`Unknown command: ${name}`);
    }
    command = name;
  }

  return {
    command,
    a: values.a,
    b: values.b,
    file: values.file,
    alpha: values.alpha,
    center: values.center,
    json: values.json ?? false,
    version: values.version ?? false,
    help: values.help ?? false,
  };
}

function resolveSamples(options: CliOptions): [number[], number[]] {
  if (options.file !== undefined) {
    return readSamplesFile(options.file);
  }
  if (options.a === undefined || options.b === undefined) {
    throw new UsageError(`${options.command ?? 'command'} needs --a and --b, or --file`);
  }
  return [parseSampleInput(options.a, 'Sample A'), parseSampleInput(options.b, 'Sample B')];
}

function analysisOptions(options: CliOptions): AnalysisOptions {
  const raw: Record<string, unknown> = {};
  if (options.alpha !== undefined) raw.significanceLevel = Number(options.alpha);
  if (options.center !== undefined) raw.center = options.center;
  return resolveAnalysisOptions(raw);
}

function runCommand(command: Command, options: CliOptions, out: CliOutput): void {
  const [sampleA, sampleB] = resolveSamples(options);

  if (command === 'ttest') {
    const report = runIndependentSamplesTTest(sampleA, sampleB, analysisOptions(options));
    report.warnings.forEach((w) => out.warn(`Warning: ${w}`));
    out.log(options.json ? toJson(report) : formatIndependentSamplesReport(report));
    return;
  }

  const result = computePearsonR(sampleA, sampleB);
  out.log(options.json ? toJson(result) : formatCorrelationResult(result));
}

export interface CliDeps {
  out: CliOutput;
  createPrompt: () => Prompt;
}

/**
 * Run the CLI and return the process exit code:
 * 0 success, 1 input or statistics error (or input ending mid-dialogue), 2 usage error
 */
export async function main(argv: string[], deps: CliDeps): Promise<number> {
  const { out } = deps;

  try {
    const options = parseCliArgs(argv);

    if (options.help) {
      out.log(HELP);
      return 0;
    }
    if (options.version) {
      out.log(VERSION);
      return 0;
    }

    if (options.command === undefined) {
      const settings = analysisOptions(options);
      const prompt = deps.createPrompt();
      try {
        await runInteractive(prompt, out, settings);
      } finally {
        prompt.close();
      }
      return 0;
    }

    runCommand(options.command, options, out);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      out.error(`Error: ${error.message}`);
      out.error(HELP);
      return 2;
    }
    if (isStatsError(error) || error instanceof EndOfInputError) {
      out.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
