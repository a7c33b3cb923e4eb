/**
 * Sequence Pool Data Model
 *
 * The unit of input for one analysis run: an ordered, immutable collection of
 * trimmed sequences keyed by unique identifiers. Composition statistics are
 * derived here once and reused by the composition-aware null model.
 */

import { MotifStatError, ErrorCode } from '../errors';

/**
 * Nucleotide alphabet accepted inside motifs
 */
export const NUCLEOTIDES = ['A', 'C', 'G', 'T'] as const;

export type Nucleotide = (typeof NUCLEOTIDES)[number];

/**
 * Per-base probabilities of a null model
 */
export type BaseProbabilities = Readonly<Record<Nucleotide, number>>;

export const UNIFORM_BASE_PROBABILITIES: BaseProbabilities = Object.freeze({
  A: 0.25,
  C: 0.25,
  G: 0.25,
  T: 0.25,
});

export function isNucleotide(char: string): char is Nucleotide {
  return char === 'A' || char === 'C' || char === 'G' || char === 'T';
}

/**
 * One trimmed sequence of the pool
 */
export interface SequenceRecord {
  readonly id: string;
  readonly sequence: string;
}

/**
 * Immutable pool of sequences, in input order
 */
export interface SequencePool {
  readonly records: readonly SequenceRecord[];
  readonly size: number;
}

/**
 * Length summary of a pool
 */
export interface PoolSummary {
  totalSequences: number;
  meanLength: number;
  minLength: number;
  maxLength: number;
}

export type SequenceInput =
  | Readonly<Record<string, string>>
  | ReadonlyMap<string, string>
  | readonly SequenceRecord[];

function isRecordList(input: SequenceInput): input is readonly SequenceRecord[] {
  return Array.isArray(input);
}

function isSequenceMap(input: SequenceInput): input is ReadonlyMap<string, string> {
  return input instanceof Map;
}

// Pools handed out by the factory, so callers can pass either a pool or raw input
const builtPools = new WeakSet<object>();

export function isSequencePool(input: SequenceInput | SequencePool): input is SequencePool {
  return builtPools.has(input);
}

/**
 * Factory for building validated pools from the shapes callers hold
 */
export class SequencePoolFactory {
  /**
   * Build a pool from a plain id → sequence object
   */
  static fromRecord(input: Readonly<Record<string, string>>): SequencePool {
    return this.fromRecords(
      Object.entries(input).map(([id, sequence]) => ({ id, sequence }))
    );
  }

  /**
   * Build a pool from an id → sequence map
   */
  static fromMap(input: ReadonlyMap<string, string>): SequencePool {
    return this.fromRecords(
      Array.from(input.entries(), ([id, sequence]) => ({ id, sequence }))
    );
  }

  /**
   * Build a pool from sequence records, rejecting empty or duplicate identifiers
   */
  static fromRecords(input: Iterable<SequenceRecord>): SequencePool {
    const seen = new Set<string>();
    const records: SequenceRecord[] = [];

    for (const record of input) {
      if (typeof record.id !== 'string' || record.id.length === 0) {
        throw new MotifStatError(ErrorCode.INVALID_DATA, 'Sequence identifier must be a non-empty string', {
          index: records.length,
        });
      }
      if (typeof record.sequence !== 'string') {
        throw new MotifStatError(ErrorCode.INVALID_DATA, `Sequence ${record.id} is not a string`, {
          id: record.id,
        });
      }
      if (seen.has(record.id)) {
        throw new MotifStatError(ErrorCode.INVALID_DATA, `Duplicate sequence identifier ${record.id}`, {
          id: record.id,
        });
      }
      seen.add(record.id);
      records.push(Object.freeze({ id: record.id, sequence: record.sequence }));
    }

    const pool: SequencePool = Object.freeze({ records: Object.freeze(records), size: records.length });
    builtPools.add(pool);
    return pool;
  }
}

/**
 * Build a pool from any supported input shape
 */
export function createSequencePool(input: SequenceInput): SequencePool {
  if (isSequenceMap(input)) {
    return SequencePoolFactory.fromMap(input);
  }
  if (isRecordList(input)) {
    return SequencePoolFactory.fromRecords(input);
  }
  return SequencePoolFactory.fromRecord(input);
}

/**
 * Composition and length statistics over a pool
 */
export class PoolStatistics {
  /**
   * Fraction of G or C characters; 0 for an empty sequence
   */
  static gcContent(sequence: string): number {
    if (sequence.length === 0) return 0;

    let gc = 0;
    for (const char of sequence) {
      if (char === 'G' || char === 'C') gc++;
    }
    return gc / sequence.length;
  }

  /**
   * Mean of the per-sequence GC content
   */
  static meanGcContent(pool: SequencePool): number {
    if (pool.size === 0) {
      throw new MotifStatError(
        ErrorCode.INSUFFICIENT_DATA,
        'Cannot estimate base composition from an empty sequence pool'
      );
    }

    let total = 0;
    for (const record of pool.records) {
      total += this.gcContent(record.sequence);
    }
    return total / pool.size;
  }

  /**
   * Base probabilities implied by the pool's mean GC content g:
   * P(G) = P(C) = g/2, P(A) = P(T) = (1 - g)/2
   */
  static estimateGcComposition(pool: SequencePool): BaseProbabilities {
    const gc = this.meanGcContent(pool);
    const pGc = gc / 2;
    const pAt = (1 - gc) / 2;
    return Object.freeze({ A: pAt, C: pGc, G: pGc, T: pAt });
  }

  static summarize(pool: SequencePool): PoolSummary {
    if (pool.size === 0) {
      return { totalSequences: 0, meanLength: 0, minLength: 0, maxLength: 0 };
    }

    let total = 0;
    let min = Infinity;
    let max = 0;
    for (const { sequence } of pool.records) {
      total += sequence.length;
      if (sequence.length < min) min = sequence.length;
      if (sequence.length > max) max = sequence.length;
    }

    return {
      totalSequences: pool.size,
      meanLength: total / pool.size,
      minLength: min,
      maxLength: max,
    };
  }
}
