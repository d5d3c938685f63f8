export { SampleValidator, MIN_SAMPLE_SIZE } from './SampleValidator';
