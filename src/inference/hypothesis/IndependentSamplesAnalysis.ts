/**
 * Levene -> t-test pipeline for two independent samples
 */

import type { IndependentSamplesReport, Sample } from '../../domain/types';
import { SampleValidator } from '../../domain/validation';
import { resolveAnalysisOptions, type AnalysisOptionsInput } from '../../config/options';
import { testEqualVariances } from './VarianceEqualityTester';
import { computeTTest } from './TTestCalculator';

/**
 * Relative size difference |nA / nB - 1|
 */
export function sampleSizeImbalance(sizeA: number, sizeB: number): number {
  return Math.abs(sizeA / sizeB - 1);
}

export function runIndependentSamplesTTest(
  sampleA: Sample,
  sampleB: Sample,
  options: AnalysisOptionsInput = {}
): IndependentSamplesReport {
  SampleValidator.validateIndependent(sampleA, sampleB);
  const resolved = resolveAnalysisOptions(options);

  const warnings: string[] = [];
  const imbalance = sampleSizeImbalance(sampleA.length, sampleB.length);
  if (imbalance > resolved.imbalanceTolerance) {
    warnings.push(
      `Sample sizes differ by ${(imbalance * 100).toFixed(1)}% ` +
        `(${sampleA.length} vs ${sampleB.length}), more than the ${(resolved.imbalanceTolerance * 100).toFixed(1)}% tolerance; ` +
        'results may be less reliable'
    );
  }

  const varianceTest = testEqualVariances(sampleA, sampleB, resolved);
  const tTest = computeTTest(sampleA, sampleB, varianceTest.equalVariances);

  return { varianceTest, tTest, warnings };
}
