/**
 * Positional queries over a pool for motifs already discovered
 */

import type { SequencePool } from '../core/data/SequencePool';

export interface PresenceMatrix {
  /** Row labels, sorted */
  sequenceIds: string[];
  /** Column labels, in the order given */
  motifs: string[];
  /** values[row][column] is 1 when the sequence contains the motif */
  values: number[][];
}

/**
 * Every start index of the motif, overlapping occurrences included.
 * Sequences without an occurrence are omitted.
 */
export function findMotifPositions(pool: SequencePool, motif: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  if (motif.length === 0) return positions;

  for (const { id, sequence } of pool.records) {
    const hits: number[] = [];
    let pos = sequence.indexOf(motif);
    while (pos !== -1) {
      hits.push(pos);
      pos = sequence.indexOf(motif, pos + 1);
    }
    if (hits.length > 0) positions.set(id, hits);
  }

  return positions;
}

export function buildPresenceMatrix(pool: SequencePool, motifs: readonly string[]): PresenceMatrix {
  const records = [...pool.records].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  return {
    sequenceIds: records.map((record) => record.id),
    motifs: [...motifs],
    values: records.map((record) =>
      motifs.map((motif) => (record.sequence.includes(motif) ? 1 : 0))
    ),
  };
}

/**
 * Most common character per column across unaligned sequences; on a tie
 * the character seen first in that column wins
 */
export function consensusSequence(sequences: readonly string[]): string {
  if (sequences.length === 0) return '';

  const width = sequences.reduce((max, seq) => Math.max(max, seq.length), 0);
  let consensus = '';

  for (let pos = 0; pos < width; pos++) {
    const counts = new Map<string, number>();
    for (const seq of sequences) {
      if (pos < seq.length) {
        counts.set(seq[pos], (counts.get(seq[pos]) ?? 0) + 1);
      }
    }

    let best = '';
    let bestCount = 0;
    for (const [char, count] of counts) {
      if (count > bestCount) {
        best = char;
        bestCount = count;
      }
    }
    consensus += best;
  }

  return consensus;
}
