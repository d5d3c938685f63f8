/**
 * Result records returned by the calculators
 *
 * All records are plain data, created per call and never mutated afterwards.
 */

/**
 * An ordered sequence of finite numbers. Callers keep ownership; nothing here mutates it.
 */
export type Sample = readonly number[];

/**
 * Centre the absolute deviations are taken from in Levene's test
 * - median: Brown–Forsythe variant, robust to non-normal data
 * - mean: the classic Levene statistic
 * - trimmed: mean after cutting a proportion from each end of the sorted sample
 */
export type LeveneCenter = 'median' | 'mean' | 'trimmed';

export type TTestMethod = 'pooled' | 'welch';

export interface VarianceDecision {
  /** Levene W statistic (an F value, >= 0) */
  statistic: number;
  /** Upper-tail probability of the statistic under F(df1, df2) */
  pValue: number;
  /** pValue > significanceLevel */
  equalVariances: boolean;
  center: LeveneCenter;
  significanceLevel: number;
  degreesOfFreedom: [number, number];
}

export interface TTestResult {
  tStatistic: number;
  degreesOfFreedom: number;
  varianceA: number;
  varianceB: number;
  meanA: number;
  meanB: number;
  sizeA: number;
  sizeB: number;
  standardError: number;
  method: TTestMethod;
  /** Two-sided p-value from Student's t distribution */
  pValue: number;
}

export interface CorrelationResult {
  /** Pearson's r, clamped to [-1, 1] */
  r: number;
  n: number;
}

/**
 * Output of the wired Levene -> t-test pipeline
 */
export interface IndependentSamplesReport {
  varianceTest: VarianceDecision;
  tTest: TTestResult;
  /** Advisory notes about the input, e.g. unbalanced sample sizes */
  warnings: string[];
}

export interface SampleSummary {
  n: number;
  mean: number;
  variance: number;
  standardDeviation: number;
  median: number;
}
