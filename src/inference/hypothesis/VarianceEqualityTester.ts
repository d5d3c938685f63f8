/**
 * Levene's test for equality of variances between two independent samples
 *
 * Each observation is replaced by its absolute deviation from the group centre,
 * and a one-way ANOVA F-test is run on those deviations.
 */

import jStat from 'jstat';
import type { LeveneCenter, Sample, VarianceDecision } from '../../domain/types';
import { SampleValidator } from '../../domain/validation';
import { mean, median, trimmedMean } from '../../core/utils/math/descriptive';
import {
  resolveAnalysisOptions,
  type AnalysisOptionsInput,
} from '../../config/options';

export type VarianceTestOptions = Pick<
  AnalysisOptionsInput,
  'significanceLevel' | 'center' | 'trimProportion'
>;

function groupCenter(values: Sample, center: LeveneCenter, trimProportion: number): number {
  switch (center) {
    case 'mean':
      return mean(values);
    case 'trimmed':
      return trimmedMean(values, trimProportion);
    case 'median':
      return median(values);
  }
}

export function testEqualVariances(
  sampleA: Sample,
  sampleB: Sample,
  options: VarianceTestOptions = {}
): VarianceDecision {
  SampleValidator.validateIndependent(sampleA, sampleB);
  const { significanceLevel, center, trimProportion } = resolveAnalysisOptions(options);

  const groups = [sampleA, sampleB].map((values) => {
    const c = groupCenter(values, center, trimProportion);
    const deviations = values.map((x) => Math.abs(x - c));
    return { deviations, mean: mean(deviations) };
  });

  const k = groups.length;
  const total = sampleA.length + sampleB.length;
  const grandMean = groups.reduce((acc, g) => acc + jStat.sum(g.deviations), 0) / total;

  let ssBetween = 0;
  let ssWithin = 0;
  for (const { deviations, mean: m } of groups) {
    ssBetween += deviations.length * (m - grandMean) ** 2;
    for (const d of deviations) {
      ssWithin += (d - m) ** 2;
    }
  }

  const df1 = k - 1;
  const df2 = total - k;

  let statistic: number;
  let pValue: number;
  if (ssWithin === 0) {
    // Deviations are constant within each group
    statistic = ssBetween === 0 ? 0 : Infinity;
    pValue = ssBetween === 0 ? 1 : 0;
  } else {
    statistic = (ssBetween / df1) / (ssWithin / df2);
    pValue = Math.min(1, Math.max(0, 1 - jStat.centralF.cdf(statistic, df1, df2)));
  }

  return {
    statistic,
    pValue,
    equalVariances: pValue > significanceLevel,
    center,
    significanceLevel,
    degreesOfFreedom: [df1, df2],
  };
}
