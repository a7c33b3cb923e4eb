/**
 * Null models for motif occurrence
 *
 * Both models assume independent positions; overlapping windows are not truly
 * independent, so the per-sequence probability is an approximation.
 */

import type { BaseProbabilities } from '../core/data/SequencePool';
import { UNIFORM_BASE_PROBABILITIES, isNucleotide } from '../core/data/SequencePool';
import type { NullExpectation } from '../domain/types/analysis';
import { probabilityAtLeastOnce } from '../core/math/special';

/**
 * Probability of a motif matching at one given position
 */
export interface NullModel {
  readonly name: string;
  siteProbability(motif: string): number;
}

/**
 * Every base equally likely: p_motif = p0^k
 */
export class UniformNullModel implements NullModel {
  readonly name = 'uniform';

  constructor(private readonly baseProbability: number = UNIFORM_BASE_PROBABILITIES.A) {}

  siteProbability(motif: string): number {
    return Math.pow(this.baseProbability, motif.length);
  }
}

/**
 * Per-base probabilities: p_motif = Π P(base)
 */
export class CompositionNullModel implements NullModel {
  constructor(
    private readonly probabilities: BaseProbabilities,
    readonly name: string = 'composition'
  ) {}

  siteProbability(motif: string): number {
    let p = 1;
    for (const char of motif) {
      p *= isNucleotide(char) ? this.probabilities[char] : 0;
    }
    return p;
  }
}

/**
 * Pick the cheaper uniform model when the probabilities allow it
 */
export function nullModelFor(probabilities: BaseProbabilities): NullModel {
  const { A, C, G, T } = probabilities;
  if (A === C && C === G && G === T) {
    return new UniformNullModel(A);
  }
  return new CompositionNullModel(probabilities);
}

/**
 * Positions a motif of length k can start at inside the random region
 */
export function positionsPerSequence(randomRegionLength: number, motifLength: number): number {
  return Math.max(1, randomRegionLength - motifLength + 1);
}

export function computeExpectation(
  model: NullModel,
  motif: string,
  randomRegionLength: number,
  sequenceCount: number
): NullExpectation {
  const siteProbability = model.siteProbability(motif);
  const positions = positionsPerSequence(randomRegionLength, motif.length);
  const sequenceProbability = probabilityAtLeastOnce(siteProbability, positions);

  return {
    siteProbability,
    positions,
    sequenceProbability,
    expectedCount: sequenceProbability * sequenceCount,
  };
}
