import { describe, it, expect } from 'vitest';
import {
  ConfigValidator,
  DEFAULT_ANALYSIS_CONFIG,
  resolveConfig,
} from '../../domain/validation/ConfigValidator';
import type { AnalysisConfig } from '../../domain/types/analysis';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/errors';

function expectInvalid(overrides: Partial<AnalysisConfig>, field?: Record<string, unknown>) {
  const error = captureError(() => resolveConfig(overrides));
  expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
  if (field) expect(error).toMatchObject({ context: field });
}

describe('ConfigValidator', () => {
  it('should fill defaults', () => {
    expect(resolveConfig()).toEqual({
      minLength: 5,
      maxLength: 15,
      minOccurrences: 2,
      randomRegionLength: 40,
      fdrThreshold: 0.05,
      baseProbabilities: { A: 0.25, C: 0.25, G: 0.25, T: 0.25 },
    });
  });

  it('should accept a well-formed configuration', () => {
    expect(() => ConfigValidator.validate({ ...DEFAULT_ANALYSIS_CONFIG, minLength: 6, maxLength: 6 })).not.toThrow();
    expect(() => resolveConfig({ fdrThreshold: 1 })).not.toThrow();
  });

  it('should reject minLength above maxLength', () => {
    expectInvalid({ minLength: 8, maxLength: 6 }, { minLength: 8, maxLength: 6 });
  });

  it('should reject non-positive or fractional lengths', () => {
    expectInvalid({ minLength: 0 }, { field: 'minLength', value: 0 });
    expectInvalid({ maxLength: 7.5 }, { field: 'maxLength', value: 7.5 });
    expectInvalid({ randomRegionLength: -3 }, { field: 'randomRegionLength', value: -3 });
  });

  it('should reject minOccurrences below 1', () => {
    expectInvalid({ minOccurrences: 0 }, { minOccurrences: 0 });
  });

  it('should reject fdrThreshold outside (0, 1]', () => {
    expectInvalid({ fdrThreshold: 0 }, { fdrThreshold: 0 });
    expectInvalid({ fdrThreshold: 1.2 }, { fdrThreshold: 1.2 });
  });

  it('should reject base probabilities that do not sum to 1', () => {
    expectInvalid({ baseProbabilities: { A: 0.3, C: 0.3, G: 0.3, T: 0.3 } });
    expectInvalid({ baseProbabilities: { A: 1.5, C: -0.5, G: 0, T: 0 } }, { base: 'A' });
  });
});
