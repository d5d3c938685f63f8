/**
 * two-sample-stats - Levene-checked independent t-test and Pearson correlation
 *
 * Pure, synchronous calculators over two numeric samples, plus the wired
 * Levene -> t-test pipeline.
 */

// Error handling
export {
  StatsError,
  InvalidInputError,
  DegenerateInputError,
  ErrorCode,
  isStatsError,
  wrapError,
} from './core/errors';

// Descriptive statistics
export {
  mean,
  sampleVariance,
  median,
  trimmedMean,
  isConstant,
  describeSample,
} from './core/utils/math/descriptive';

// Calculators
export {
  testEqualVariances,
  computeTTest,
  twoSidedPValue,
  computePearsonR,
  runIndependentSamplesTTest,
  sampleSizeImbalance,
} from './inference';
export type { VarianceTestOptions } from './inference';

// Options
export {
  AnalysisOptionsSchema,
  resolveAnalysisOptions,
  DEFAULT_SIGNIFICANCE_LEVEL,
} from './config/options';
export type { AnalysisOptions, AnalysisOptionsInput } from './config/options';

// Validation and result types
export { SampleValidator, MIN_SAMPLE_SIZE } from './domain/validation';
export type * from './domain/types';

// Version
export { VERSION } from './version';
