/**
 * Plain-text rendering of result records
 */

import type {
  CorrelationResult,
  IndependentSamplesReport,
  TTestResult,
  VarianceDecision,
} from '../domain/types';

export function formatPValue(p: number): string {
  return p < 0.0001 ? '< 0.0001' : p.toFixed(4);
}

export function formatVarianceDecision(decision: VarianceDecision): string[] {
  const [df1, df2] = decision.degreesOfFreedom;
  return [
    `Levene's Test (${decision.center}-centred): W = ${decision.statistic.toFixed(4)}, ` +
      `p = ${formatPValue(decision.pValue)}, df = (${df1}, ${df2})`,
    `Variances ${decision.equalVariances ? 'assumed equal' : 'assumed unequal'} ` +
      `at significance level ${decision.significanceLevel}`,
  ];
}

export function formatTTestResult(result: TTestResult): string[] {
  return [
    `Method: ${result.method === 'pooled' ? 'pooled-variance t-test' : "Welch's t-test"}`,
    `T Statistic: ${result.tStatistic.toFixed(4)}`,
    `Degrees of Freedom: ${result.degreesOfFreedom.toFixed(2)}`,
    `Variance of Sample A: ${result.varianceA.toFixed(4)}`,
    `Variance of Sample B: ${result.varianceB.toFixed(4)}`,
    `p-value (two-sided): ${formatPValue(result.pValue)}`,
  ];
}

export function formatIndependentSamplesReport(report: IndependentSamplesReport): string {
  return [
    'Results:',
    ...formatVarianceDecision(report.varianceTest),
    ...formatTTestResult(report.tTest),
  ].join('\n');
}

export function formatCorrelationResult(result: CorrelationResult): string {
  return `Correlation Coefficient (r): ${result.r.toFixed(4)} (n = ${result.n})`;
}

/**
 * Pretty JSON that keeps non-finite numbers (an unbounded Levene W) as
 * "Infinity" / "-Infinity" / "NaN" strings instead of null
 */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === 'number' && !Number.isFinite(v) ? String(v) : v),
    2
  );
}
