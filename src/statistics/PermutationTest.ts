/**
 * Permutation validation for a single motif
 *
 * Builds an empirical null by shuffling every sequence independently and
 * counting how many shuffled sequences still contain the motif. Costs
 * O(trials × total sequence length); meant as a cross-check, not for ranking.
 */

import type { SequencePool } from '../core/data/SequencePool';
import { RNG } from '../core/math/random';
import { MotifStatError, ErrorCode } from '../core/errors';
import { checkpoint } from '../core/utils/cancellation';

export interface PermutationOptions {
  trials?: number;
  seed?: number;
  rng?: RNG;
  signal?: AbortSignal;
}

export interface PermutationResult {
  motif: string;
  observedCount: number;
  trials: number;
  nullCounts: number[];
  /** (#{null ≥ observed} + 1) / (trials + 1), never 0 */
  pValue: number;
}

const DEFAULT_TRIALS = 1000;

export function countContaining(sequences: readonly string[], motif: string): number {
  let count = 0;
  for (const seq of sequences) {
    if (seq.includes(motif)) count++;
  }
  return count;
}

export async function permutationTest(
  pool: SequencePool,
  motif: string,
  options: PermutationOptions = {}
): Promise<PermutationResult> {
  const trials = options.trials ?? DEFAULT_TRIALS;
  if (!Number.isInteger(trials) || trials < 1) {
    throw new MotifStatError(ErrorCode.INVALID_INPUT, 'Permutation trials must be a positive integer', {
      trials,
    });
  }
  if (motif.length === 0) {
    throw new MotifStatError(ErrorCode.INVALID_INPUT, 'Motif must not be empty');
  }

  const rng = options.rng ?? new RNG(options.seed);
  const sequences = pool.records.map((record) => record.sequence);
  const observedCount = countContaining(sequences, motif);

  const nullCounts: number[] = new Array(trials);
  let atLeastObserved = 0;

  for (let t = 0; t < trials; t++) {
    if (t % 50 === 0) await checkpoint(options.signal, 'permutation');

    let count = 0;
    for (const seq of sequences) {
      if (rng.shuffleString(seq).includes(motif)) count++;
    }
    nullCounts[t] = count;
    if (count >= observedCount) atLeastObserved++;
  }

  return {
    motif,
    observedCount,
    trials,
    nullCounts,
    pValue: (atLeastObserved + 1) / (trials + 1),
  };
}
