/**
 * K-mer Miner
 *
 * Enumerates every fixed-length substring made only of A/C/G/T and records,
 * per distinct motif, the set of sequences containing it. Presence is per
 * sequence: repeated occurrences inside one sequence count once.
 */

import type { SequencePool } from '../core/data/SequencePool';
import { isNucleotide } from '../core/data/SequencePool';
import type { AnalysisConfig, MotifCandidate, RunProgress } from '../domain/types/analysis';
import { MotifStatError, ErrorCode } from '../core/errors';
import { throwIfAborted } from '../core/utils/cancellation';

/**
 * motif → ids of the sequences containing it
 */
export type SupportMap = Map<string, Set<string>>;

export interface MinerOptions {
  signal?: AbortSignal;
  maxCandidates?: number;
  onProgress?: (progress: RunProgress) => void;
}

export class KmerMiner {
  constructor(
    private readonly config: Pick<AnalysisConfig, 'minLength' | 'maxLength' | 'minOccurrences'>,
    private readonly options: MinerOptions = {}
  ) {}

  /**
   * Mine and apply the occurrence filter
   */
  run(pool: SequencePool): MotifCandidate[] {
    return toCandidates(this.filterByOccurrence(this.mine(pool)));
  }

  /**
   * Raw support map over every length in [minLength, maxLength]
   */
  mine(pool: SequencePool): SupportMap {
    const { minLength, maxLength } = this.config;
    const support: SupportMap = new Map();

    for (let k = minLength; k <= maxLength; k++) {
      this.mineLength(pool, k, support);
    }

    return support;
  }

  /**
   * Add every valid k-mer of one length to the support map
   */
  mineLength(pool: SequencePool, k: number, support: SupportMap): void {
    const { minLength, maxLength } = this.config;
    const { signal, maxCandidates, onProgress } = this.options;

    throwIfAborted(signal, 'mining');

    for (const { id, sequence } of pool.records) {
      const validRun = validRunLengths(sequence);

      for (let end = k - 1; end < sequence.length; end++) {
        if (validRun[end] < k) continue;

        const kmer = sequence.slice(end - k + 1, end + 1);
        let ids = support.get(kmer);
        if (!ids) {
          ids = new Set();
          support.set(kmer, ids);
          if (maxCandidates !== undefined && support.size > maxCandidates) {
            throw new MotifStatError(
              ErrorCode.RESOURCE_LIMIT,
              `Distinct motif count exceeded the cap of ${maxCandidates}`,
              { maxCandidates, length: k }
            );
          }
        }
        ids.add(id);
      }
    }

    onProgress?.({ stage: 'mining', progress: (k - minLength + 1) / (maxLength - minLength + 1) });
  }

  /**
   * Keep motifs shared by at least minOccurrences sequences
   */
  filterByOccurrence(support: SupportMap): SupportMap {
    const filtered: SupportMap = new Map();
    for (const [motif, ids] of support) {
      if (ids.size >= this.config.minOccurrences) {
        filtered.set(motif, ids);
      }
    }
    return filtered;
  }
}

/**
 * Lengths of the valid-base runs ending at each position
 */
export function validRunLengths(sequence: string): Uint32Array {
  const runs = new Uint32Array(sequence.length);
  let current = 0;
  for (let i = 0; i < sequence.length; i++) {
    current = isNucleotide(sequence[i]) ? current + 1 : 0;
    runs[i] = current;
  }
  return runs;
}

export function toCandidates(support: ReadonlyMap<string, ReadonlySet<string>>): MotifCandidate[] {
  return Array.from(support, ([motif, ids]) => ({ motif, length: motif.length, support: ids }));
}
