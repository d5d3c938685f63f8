/**
 * Analysis options
 *
 * Zod schema for the tunables of the independent-samples pipeline.
 * Every field has a default, so an empty object is a valid configuration.
 */

import { z } from 'zod';
import { StatsError, ErrorCode } from '../core/errors';

export const DEFAULT_SIGNIFICANCE_LEVEL = 0.05;
export const DEFAULT_TRIM_PROPORTION = 0.05;
export const DEFAULT_IMBALANCE_TOLERANCE = 0.1;

export const LeveneCenterSchema = z.enum(['median', 'mean', 'trimmed']);

export const AnalysisOptionsSchema = z.object({
  significanceLevel: z
    .number()
    .gt(0, 'must be > 0')
    .lt(1, 'must be < 1')
    .default(DEFAULT_SIGNIFICANCE_LEVEL),
  center: LeveneCenterSchema.default('median'),
  trimProportion: z
    .number()
    .min(0, 'must be >= 0')
    .lt(0.5, 'must be < 0.5')
    .default(DEFAULT_TRIM_PROPORTION),
  imbalanceTolerance: z.number().min(0, 'must be >= 0').default(DEFAULT_IMBALANCE_TOLERANCE),
});

export type AnalysisOptions = z.infer<typeof AnalysisOptionsSchema>;
export type AnalysisOptionsInput = z.input<typeof AnalysisOptionsSchema>;

/**
 * Apply defaults and validate; raises INVALID_CONFIG listing every failing field
 */
export function resolveAnalysisOptions(input: unknown = {}): AnalysisOptions {
  const result = AnalysisOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new StatsError(ErrorCode.INVALID_CONFIG, `Invalid analysis options: ${issues.join('; ')}`, {
      issues,
    });
  }
  return result.data;
}
