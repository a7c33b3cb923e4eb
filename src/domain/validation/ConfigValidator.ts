/**
 * Config Validator
 *
 * Validates analysis parameters before any mining starts.
 */

import type { AnalysisConfig } from '../types/analysis';
import { NUCLEOTIDES, UNIFORM_BASE_PROBABILITIES } from '../../core/data/SequencePool';
import { MotifStatError, ErrorCode } from '../../core/errors';

const PROBABILITY_SUM_TOLERANCE = 1e-9;

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  minLength: 5,
  maxLength: 15,
  minOccurrences: 2,
  randomRegionLength: 40,
  fdrThreshold: 0.05,
  baseProbabilities: UNIFORM_BASE_PROBABILITIES,
});

/**
 * Fill unspecified fields with defaults and validate the result
 */
export function resolveConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG, ...overrides };
  ConfigValidator.validate(config);
  return config;
}

export class ConfigValidator {
  static validate(config: AnalysisConfig): void {
    this.validateLengths(config);
    this.validateThresholds(config);
    this.validateProbabilities(config);
  }

  private static validateLengths(config: AnalysisConfig): void {
    const { minLength, maxLength, randomRegionLength } = config;

    for (const [field, value] of [
      ['minLength', minLength],
      ['maxLength', maxLength],
      ['randomRegionLength', randomRegionLength],
    ] as const) {
      if (!Number.isInteger(value) || value < 1) {
        throw new MotifStatError(ErrorCode.INVALID_CONFIG, `${field} must be a positive integer`, {
          field,
          value,
        });
      }
    }

    if (minLength > maxLength) {
      throw new MotifStatError(ErrorCode.INVALID_CONFIG, 'minLength must not exceed maxLength', {
        minLength,
        maxLength,
      });
    }
  }

  private static validateThresholds(config: AnalysisConfig): void {
    const { minOccurrences, fdrThreshold } = config;

    if (!Number.isInteger(minOccurrences) || minOccurrences < 1) {
      throw new MotifStatError(ErrorCode.INVALID_CONFIG, 'minOccurrences must be an integer ≥ 1', {
        minOccurrences,
      });
    }

    if (!(fdrThreshold > 0 && fdrThreshold <= 1)) {
      throw new MotifStatError(ErrorCode.INVALID_CONFIG, 'fdrThreshold must lie in (0, 1]', {
        fdrThreshold,
      });
    }
  }

  private static validateProbabilities(config: AnalysisConfig): void {
    let sum = 0;
    for (const base of NUCLEOTIDES) {
      const probability = config.baseProbabilities[base];
      if (!(probability >= 0 && probability <= 1)) {
        throw new MotifStatError(
          ErrorCode.INVALID_CONFIG,
          `Probability of base ${base} must lie in [0, 1]`,
          { base, probability }
        );
      }
      sum += probability;
    }

    if (Math.abs(sum - 1) > PROBABILITY_SUM_TOLERANCE) {
      throw new MotifStatError(ErrorCode.INVALID_CONFIG, 'Base probabilities must sum to 1', {
        sum,
      });
    }
  }
}
