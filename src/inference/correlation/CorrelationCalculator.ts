/**
 * Pearson's correlation coefficient
 *
 * Computed directly from one pass of running sums (Σx, Σy, Σxy, Σx², Σy²),
 * taken over deviations from each sample's first value. The shift leaves r
 * unchanged and keeps large offsets from cancelling the spreads.
 */

import type { CorrelationResult, Sample } from '../../domain/types';
import { SampleValidator } from '../../domain/validation';
import { DegenerateInputError } from '../../core/errors';
import { isConstant } from '../../core/utils/math/descriptive';

export function computePearsonR(sampleA: Sample, sampleB: Sample): CorrelationResult {
  SampleValidator.validatePaired(sampleA, sampleB);

  const n = sampleA.length;
  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  let sumY2 = 0;

  const originX = sampleA[0];
  const originY = sampleB[0];

  sampleA.forEach((value, i) => {
    const x = value - originX;
    const y = sampleB[i] - originY;
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumX2 += x * x;
    sumY2 += y * y;
  });

  const spreadX = n * sumX2 - sumX * sumX;
  const spreadY = n * sumY2 - sumY * sumY;

  // Rounding can leave a tiny negative spread for a constant sample
  if (!(spreadX > 0) || isConstant(sampleA)) {
    throw new DegenerateInputError('Sample A has zero variance, so the correlation is undefined', {
      sample: 'Sample A',
    });
  }
  if (!(spreadY > 0) || isConstant(sampleB)) {
    throw new DegenerateInputError('Sample B has zero variance, so the correlation is undefined', {
      sample: 'Sample B',
    });
  }

  const r = (n * sumXY - sumX * sumY) / Math.sqrt(spreadX * spreadY);

  return { r: Math.min(1, Math.max(-1, r)), n };
}
