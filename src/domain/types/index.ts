export type {
  Sample,
  LeveneCenter,
  TTestMethod,
  VarianceDecision,
  TTestResult,
  CorrelationResult,
  IndependentSamplesReport,
  SampleSummary,
} from './statistics';
