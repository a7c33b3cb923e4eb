/**
 * Significance Tester
 *
 * One-sided binomial exceedance test: with N sequences and per-sequence hit
 * probability p_seq, the p-value of observing a motif in `observed` sequences
 * is P(X ≥ observed) for X ~ Binomial(N, p_seq).
 */

import { BinomialDistribution } from '../core/distributions/BinomialDistribution';
import { MotifStatError, ErrorCode } from '../core/errors';
import type { MotifCandidate, MotifTestResult } from '../domain/types/analysis';
import type { NullModel } from './NullModel';
import { computeExpectation } from './NullModel';

export class SignificanceTester {
  constructor(
    private readonly model: NullModel,
    private readonly randomRegionLength: number,
    private readonly sequenceCount: number
  ) {
    if (!Number.isInteger(sequenceCount) || sequenceCount < 1) {
      throw new MotifStatError(
        ErrorCode.INVALID_CONFIG,
        'Binomial test needs at least one sequence in the pool',
        { sequenceCount }
      );
    }
  }

  /**
   * P(X ≥ observed), i.e. the survival function at observed - 1
   */
  pValue(observed: number, sequenceProbability: number): number {
    return new BinomialDistribution(this.sequenceCount, sequenceProbability).survival(observed - 1);
  }

  test(candidate: Pick<MotifCandidate, 'motif' | 'support'>): MotifTestResult {
    return this.testMotif(candidate.motif, candidate.support.size);
  }

  testMotif(motif: string, observedCount: number): MotifTestResult {
    const expectation = computeExpectation(
      this.model,
      motif,
      this.randomRegionLength,
      this.sequenceCount
    );

    return {
      ...expectation,
      observedCount,
      foldEnrichment: foldEnrichment(observedCount, expectation.expectedCount),
      pValue: this.pValue(observedCount, expectation.sequenceProbability),
    };
  }
}

/**
 * observed / expected, +∞ when nothing is expected
 */
export function foldEnrichment(observed: number, expected: number): number {
  return expected > 0 ? observed / expected : Infinity;
}
