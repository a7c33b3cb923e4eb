/**
 * Analysis Data Structures
 *
 * Domain-level interfaces shared by the discovery and statistics stages.
 */

import type { BaseProbabilities } from '../../core/data/SequencePool';

/**
 * Parameters of one analysis run
 */
export interface AnalysisConfig {
  /** Shortest motif length mined */
  minLength: number;

  /** Longest motif length mined */
  maxLength: number;

  /** Minimum number of sequences that must share a motif */
  minOccurrences: number;

  /** Expected length of the random region each sequence was drawn from */
  randomRegionLength: number;

  /** α used by the Benjamini-Hochberg procedure */
  fdrThreshold: number;

  /** Per-base probabilities of the primary null model */
  baseProbabilities: BaseProbabilities;
}

/**
 * A mined motif and the sequences containing it
 */
export interface MotifCandidate {
  readonly motif: string;
  readonly length: number;
  readonly support: ReadonlySet<string>;
}

/**
 * Null-model expectation for a motif
 */
export interface NullExpectation {
  /** Probability of the motif at a single position */
  siteProbability: number;
  /** Positions checked per sequence */
  positions: number;
  /** Probability that a sequence contains the motif at least once */
  sequenceProbability: number;
  /** Expected number of sequences containing the motif */
  expectedCount: number;
}

/**
 * Per-motif test outcome before multiple-testing correction
 */
export interface MotifTestResult extends NullExpectation {
  observedCount: number;
  foldEnrichment: number;
  pValue: number;
}

/**
 * One row of the final enrichment table
 */
export interface EnrichmentRecord {
  readonly motif: string;
  readonly length: number;
  readonly count: number;
  readonly expectedCount: number;
  readonly foldEnrichment: number;
  readonly frequency: number;
  readonly pValue: number;
  readonly fdr: number;
  readonly significant: boolean;
  readonly sequences: readonly string[];

  /** Present when the composition-aware null model was run */
  readonly pValueGcAdjusted?: number;
  readonly fdrGcAdjusted?: number;
}

/**
 * Progress notification emitted between and within stages
 */
export interface RunProgress {
  stage: 'mining' | 'reduction' | 'testing' | 'correction' | 'assembly';
  progress: number;
}

/**
 * Run-level options, kept apart from the analysis parameters
 */
export interface RunOptions {
  /** Also test every motif against a GC-composition null model */
  gcAdjusted?: boolean;
  /** Abort the run; checked between and within stages */
  signal?: AbortSignal;
  /** Hard cap on distinct motif strings held during mining */
  maxCandidates?: number;
  verbose?: boolean;
  onProgress?: (progress: RunProgress) => void;
}
