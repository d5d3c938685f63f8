/**
 * Levene -> t-test pipeline
 */

import { describe, it, expect } from 'vitest';
import {
  runIndependentSamplesTTest,
  sampleSizeImbalance,
} from '../../inference/hypothesis/IndependentSamplesAnalysis';
import { testEqualVariances } from '../../inference/hypothesis/VarianceEqualityTester';
import { computeTTest } from '../../inference/hypothesis/TTestCalculator';
import { DegenerateInputError, ErrorCode, StatsError } from '../../core/errors';

const textbookA = [2, 4, 4, 4, 5, 5, 7, 9];
const textbookB = [1, 2, 3, 4, 5, 6, 7, 8];

const narrow = [1, 2, 3, 4, 5];
const wide = [10, 20, 30, 40, 50, 60];

describe('runIndependentSamplesTTest', () => {
  it('should take the pooled path when Levene keeps equal variances', () => {
    const report = runIndependentSamplesTTest(textbookA, textbookB);

    expect(report.varianceTest.equalVariances).toBe(true);
    expect(report.tTest.method).toBe('pooled');
    expect(report.tTest.degreesOfFreedom).toBe(14);
    expect(Number.isFinite(report.tTest.tStatistic)).toBe(true);
    expect(report.warnings).toEqual([]);
  });

  it('should take the Welch path when Levene rejects equal variances', () => {
    const report = runIndependentSamplesTTest(narrow, wide);

    expect(report.varianceTest.equalVariances).toBe(false);
    expect(report.tTest.method).toBe('welch');
    expect(report.tTest).toEqual(computeTTest(narrow, wide, false));
  });

  it('should match calling the two steps by hand', () => {
    const report = runIndependentSamplesTTest(textbookA, textbookB, { center: 'mean' });
    const decision = testEqualVariances(textbookA, textbookB, { center: 'mean' });

    expect(report.varianceTest).toEqual(decision);
    expect(report.tTest).toEqual(computeTTest(textbookA, textbookB, decision.equalVariances));
  });

  it('should pass the significance level through to the decision', () => {
    const report = runIndependentSamplesTTest(narrow, wide, { significanceLevel: 0.001 });

    expect(report.varianceTest.significanceLevel).toBe(0.001);
    expect(report.tTest.method).toBe('pooled');
  });

  describe('sample size warning', () => {
    it('should warn when sizes differ by more than 10%', () => {
      const report = runIndependentSamplesTTest(narrow, wide);

      expect(report.warnings).toEqual([
        'Sample sizes differ by 16.7% (5 vs 6), more than the 10.0% tolerance; results may be less reliable',
      ]);
    });

    it('should honour a wider tolerance', () => {
      const report = runIndependentSamplesTTest(narrow, wide, { imbalanceTolerance: 0.2 });
      expect(report.warnings).toEqual([]);
    });

    it('should measure the imbalance relative to sample B', () => {
      expect(sampleSizeImbalance(8, 8)).toBe(0);
      expect(sampleSizeImbalance(5, 6)).toBeCloseTo(1 / 6, 12);
      expect(sampleSizeImbalance(12, 10)).toBeCloseTo(0.2, 12);
    });
  });

  describe('failures', () => {
    it('should surface degenerate input from the t-test', () => {
      expect(() => runIndependentSamplesTTest([3, 3, 3], [7, 7, 7])).toThrow(DegenerateInputError);
    });

    it('should reject invalid options before computing', () => {
      try {
        runIndependentSamplesTTest(textbookA, textbookB, { significanceLevel: -1 });
        expect.unreachable('expected INVALID_CONFIG');
      } catch (error) {
        expect(error).toBeInstanceOf(StatsError);
        if (error instanceof StatsError) {
          expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
        }
      }
    });

    it('should reject a one-value sample', () => {
      expect(() => runIndependentSamplesTTest([1], textbookB)).toThrow(
        'Sample A must contain at least 2 values, got 1'
      );
    });
  });
});
