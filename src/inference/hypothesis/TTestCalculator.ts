/**
 * Independent two-sample t-test
 *
 * Uses the pooled-variance formula when the variances are taken as equal and
 * Welch's formula with Welch–Satterthwaite degrees of freedom otherwise. The
 * equal-variance decision comes from the caller (see testEqualVariances).
 */

import jStat from 'jstat';
import type { Sample, TTestMethod, TTestResult } from '../../domain/types';
import { SampleValidator } from '../../domain/validation';
import { DegenerateInputError } from '../../core/errors';
import { isConstant, mean, sampleVariance } from '../../core/utils/math/descriptive';

interface StandardErrorEstimate {
  standardError: number;
  degreesOfFreedom: number;
}

function pooledEstimate(varA: number, nA: number, varB: number, nB: number): StandardErrorEstimate {
  const degreesOfFreedom = nA + nB - 2;
  const pooledVariance = ((nA - 1) * varA + (nB - 1) * varB) / degreesOfFreedom;
  return {
    standardError: Math.sqrt(pooledVariance * (1 / nA + 1 / nB)),
    degreesOfFreedom,
  };
}

function welchEstimate(varA: number, nA: number, varB: number, nB: number): StandardErrorEstimate {
  const a = varA / nA;
  const b = varB / nB;
  const standardError = Math.sqrt(a + b);
  // Welch–Satterthwaite; NaN when both variances are zero, which computeTTest rejects
  const degreesOfFreedom = (a + b) ** 2 / (a ** 2 / (nA - 1) + b ** 2 / (nB - 1));
  return { standardError, degreesOfFreedom };
}

/**
 * Two-sided p-value of t under Student's t with the given degrees of freedom
 */
export function twoSidedPValue(tStatistic: number, degreesOfFreedom: number): number {
  const tail = 1 - jStat.studentt.cdf(Math.abs(tStatistic), degreesOfFreedom);
  return Math.min(1, Math.max(0, 2 * tail));
}

export function computeTTest(
  sampleA: Sample,
  sampleB: Sample,
  equalVariances: boolean
): TTestResult {
  SampleValidator.validateIndependent(sampleA, sampleB);

  const nA = sampleA.length;
  const nB = sampleB.length;
  const meanA = mean(sampleA);
  const meanB = mean(sampleB);
  const varianceA = sampleVariance(sampleA);
  const varianceB = sampleVariance(sampleB);

  const method: TTestMethod = equalVariances ? 'pooled' : 'welch';
  const estimate =
    method === 'pooled'
      ? pooledEstimate(varianceA, nA, varianceB, nB)
      : welchEstimate(varianceA, nA, varianceB, nB);

  if (!(estimate.standardError > 0) || (isConstant(sampleA) && isConstant(sampleB))) {
    throw new DegenerateInputError(
      'Standard error is zero: both samples are constant, so the t statistic is undefined',
      { varianceA, varianceB, method }
    );
  }

  const tStatistic = (meanA - meanB) / estimate.standardError;

  return {
    tStatistic,
    degreesOfFreedom: estimate.degreesOfFreedom,
    varianceA,
    varianceB,
    meanA,
    meanB,
    sizeA: nA,
    sizeB: nB,
    standardError: estimate.standardError,
    method,
    pValue: twoSidedPValue(tStatistic, estimate.degreesOfFreedom),
  };
}
