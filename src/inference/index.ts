export { testEqualVariances } from './hypothesis/VarianceEqualityTester';
export type { VarianceTestOptions } from './hypothesis/VarianceEqualityTester';
export { computeTTest, twoSidedPValue } from './hypothesis/TTestCalculator';
export {
  runIndependentSamplesTTest,
  sampleSizeImbalance,
} from './hypothesis/IndependentSamplesAnalysis';
export { computePearsonR } from './correlation/CorrelationCalculator';
