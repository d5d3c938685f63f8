/**
 * Sample Validator
 *
 * Checks the structural preconditions every calculator shares before any
 * arithmetic runs. Numerical degeneracy (zero variance) is detected by the
 * calculators themselves.
 */

import type { Sample } from '../types';
import { InvalidInputError } from '../../core/errors';

export const MIN_SAMPLE_SIZE = 2;

export class SampleValidator {
  /**
   * Validate a single sample: enough observations, all finite
   */
  static validateSample(values: Sample, label: string, minSize: number = MIN_SAMPLE_SIZE): void {
    if (!Array.isArray(values)) {
      throw new InvalidInputError(`${label} must be an array of numbers`, { sample: label });
    }

    if (values.length < minSize) {
      throw new InvalidInputError(
        `${label} must contain at least ${minSize} values, got ${values.length}`,
        { sample: label, actualCount: values.length, minimumRequired: minSize }
      );
    }

    const badIndex = values.findIndex((v) => typeof v !== 'number' || !Number.isFinite(v));
    if (badIndex !== -1) {
      throw new InvalidInputError(
        `${label} contains a non-finite value at index ${badIndex}`,
        { sample: label, index: badIndex, value: String(values[badIndex]) }
      );
    }
  }

  /**
   * Validate two independent samples (sizes may differ)
   */
  static validateIndependent(sampleA: Sample, sampleB: Sample): void {
    this.validateSample(sampleA, 'Sample A');
    this.validateSample(sampleB, 'Sample B');
  }

  /**
   * Validate paired observations: equal lengths, then each sample on its own
   */
  static validatePaired(sampleA: Sample, sampleB: Sample): void {
    if (Array.isArray(sampleA) && Array.isArray(sampleB) && sampleA.length !== sampleB.length) {
      throw new InvalidInputError(
        `Both samples must contain the same number of values (Sample A has ${sampleA.length}, Sample B has ${sampleB.length})`,
        { lengthA: sampleA.length, lengthB: sampleB.length }
      );
    }

    this.validateSample(sampleA, 'Sample A');
    this.validateSample(sampleB, 'Sample B');
  }
}
