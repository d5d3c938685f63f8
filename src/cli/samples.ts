/**
 * Turning user text into samples
 */

import { existsSync, readFileSync } from 'fs';
import { InvalidInputError } from '../core/errors';

/**
 * Parse "1, 2.5, 3" (commas and/or whitespace) into numbers
 */
export function parseSampleInput(text: string, label = 'Sample'): number[] {
  const tokens = text.split(/[,\s]+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    throw new InvalidInputError(`${label} is empty: enter numbers separated by commas`, {
      sample: label,
    });
  }

  return tokens.map((token) => {
    const value = Number(token);
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(
        `${label} contains "${token}", which is not a number: enter numbers separated by commas`,
        { sample: label, token }
      );
    }
    return value;
  });
}

/**
 * Read two samples from a text file: the first two non-empty lines that are not
 * '#' comments hold sample A and sample B.
 */
export function readSamplesFile(path: string): [number[], number[]] {
  if (!existsSync(path)) {
    throw new InvalidInputError(`Sample file not found: ${path}`, { path });
  }

  const lines = readFileSync(path, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));

  const [first, second] = lines;
  if (first === undefined || second === undefined) {
    throw new InvalidInputError(`Sample file must contain two lines of numbers: ${path}`, {
      path,
      lineCount: lines.length,
    });
  }

  return [parseSampleInput(first, 'Sample A'), parseSampleInput(second, 'Sample B')];
}
