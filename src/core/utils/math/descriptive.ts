// src/core/utils/math/descriptive.ts
/**
 * Descriptive statistics over a single sample
 */

import jStat from 'jstat';
import type { Sample, SampleSummary } from '../../../domain/types';
import { SampleValidator } from '../../../domain/validation';
import { InvalidInputError } from '../../errors';

export function mean(values: Sample): number {
  return jStat.mean(values);
}

/**
 * Unbiased sample variance (n - 1 denominator); exactly 0 for a constant sample
 */
export function sampleVariance(values: Sample): number {
  if (isConstant(values)) return 0;
  return jStat.variance(values, true);
}

export function median(values: Sample): number {
  return jStat.median(values);
}

/**
 * Mean after cutting floor(proportion * n) observations from each end of the sorted sample
 */
export function trimmedMean(values: Sample, proportion: number): number {
  if (!(proportion >= 0 && proportion < 0.5)) {
    throw new InvalidInputError('Trim proportion must lie in [0, 0.5)', { proportion });
  }

  const sorted = [...values].sort((a, b) => a - b);
  const cut = Math.floor(proportion * sorted.length);
  return jStat.mean(sorted.slice(cut, sorted.length - cut));
}

export function describeSample(values: Sample, label = 'Sample'): SampleSummary {
  SampleValidator.validateSample(values, label);

  const variance = sampleVariance(values);
  return {
    n: values.length,
    mean: mean(values),
    variance,
    standardDeviation: Math.sqrt(variance),
    median: median(values),
  };
}

/**
 * True when every observation equals the first
 */
export function isConstant(values: Sample): boolean {
  return values.every((v) => v === values[0]);
}
