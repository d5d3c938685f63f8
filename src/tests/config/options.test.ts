import { describe, it, expect } from 'vitest';
import { resolveAnalysisOptions, AnalysisOptionsSchema } from '../../config/options';
import { ErrorCode, StatsError } from '../../core/errors';

function configError(input: unknown): StatsError {
  try {
    resolveAnalysisOptions(input);
  } catch (error) {
    if (error instanceof StatsError) return error;
    throw error;
  }
  throw new Error('Expected INVALID_CONFIG');
}

describe('resolveAnalysisOptions', () => {
  it('should fill every default', () => {
    expect(resolveAnalysisOptions()).toEqual({
      significanceLevel: 0.05,
      center: 'median',
      trimProportion: 0.05,
      imbalanceTolerance: 0.1,
    });
  });

  it('should keep supplied values', () => {
    const options = resolveAnalysisOptions({ significanceLevel: 0.01, center: 'mean' });

    expect(options.significanceLevel).toBe(0.01);
    expect(options.center).toBe('mean');
    expect(options.trimProportion).toBe(0.05);
  });

  it('should reject a significance level outside (0, 1)', () => {
    const error = configError({ significanceLevel: 1.5 });

    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.message).toBe('Invalid analysis options: significanceLevel: must be < 1');
    expect(error.context).toEqual({ issues: ['significanceLevel: must be < 1'] });

    expect(configError({ significanceLevel: 0 }).message).toBe(
      'Invalid analysis options: significanceLevel: must be > 0'
    );
  });

  it('should reject NaN and unknown centres', () => {
    expect(configError({ significanceLevel: Number('abc') }).code).toBe(ErrorCode.INVALID_CONFIG);
    expect(configError({ center: 'mode' }).message).toMatch(/^Invalid analysis options: center: /);
  });

  it('should reject a trim proportion of one half', () => {
    expect(configError({ trimProportion: 0.5 }).message).toBe(
      'Invalid analysis options: trimProportion: must be < 0.5'
    );
  });

  it('should expose the schema for callers validating their own input', () => {
    expect(AnalysisOptionsSchema.safeParse({ imbalanceTolerance: -1 }).success).toBe(false);
  });
});
