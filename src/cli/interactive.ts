/**
 * Interactive menu: pick a calculation, type two samples, read the result
 */

import { isStatsError, InvalidInputError } from '../core/errors';
import { runIndependentSamplesTTest, computePearsonR } from '../inference';
import type { AnalysisOptionsInput } from '../config/options';
import { parseSampleInput } from './samples';
import { formatCorrelationResult, formatIndependentSamplesReport } from './format';
import type { CliOutput, Prompt } from './io';

export const MENU = [
  '',
  'Options',
  '1: Independent Samples T-Test',
  "2: Pearson's Correlation Coefficient",
  '3: Exit',
].join('\n');

async function askSample(prompt: Prompt, out: CliOutput, label: string): Promise<number[]> {
  for (;;) {
    const answer = await prompt.question(`Enter numbers for ${label}, separated by commas: `);
    try {
      return parseSampleInput(answer, label);
    } catch (error) {
      if (!(error instanceof InvalidInputError)) throw error;
      out.error('Invalid input. Please enter numbers separated by commas.');
    }
  }
}

function reportFailure(out: CliOutput, error: unknown): void {
  if (!isStatsError(error)) throw error;
  out.error(`Error: ${error.message}`);
}

export async function runInteractive(
  prompt: Prompt,
  out: CliOutput,
  options: AnalysisOptionsInput = {}
): Promise<void> {
  out.log('Two-Sample Statistics Calculator');

  for (;;) {
    out.log(MENU);
    const choice = (await prompt.question('Enter your choice (1, 2, or 3): ')).trim();

    if (choice === '1') {
      out.log('\nIndependent Samples T-Test');
      const sampleA = await askSample(prompt, out, 'Sample A');
      const sampleB = await askSample(prompt, out, 'Sample B');
      try {
        const report = runIndependentSamplesTTest(sampleA, sampleB, options);
        report.warnings.forEach((w) => out.warn(`Warning: ${w}`));
        out.log(`\n${formatIndependentSamplesReport(report)}`);
      } catch (error) {
        reportFailure(out, error);
      }
    } else if (choice === '2') {
      out.log("\nPearson's Correlation Coefficient");
      const x = await askSample(prompt, out, 'X (first variable)');
      const y = await askSample(prompt, out, 'Y (second variable)');
      try {
        out.log(`\n${formatCorrelationResult(computePearsonR(x, y))}`);
      } catch (error) {
        reportFailure(out, error);
      }
    } else if (choice === '3') {
      out.log('Goodbye!');
      return;
    } else {
      out.log('Invalid choice. Please enter 1, 2, or 3.');
    }
  }
}
