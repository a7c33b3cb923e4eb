/**
 * Metadata that accompanies every analysis result
 */
export interface ResultMetadata {
  /** When the analysis was performed */
  timestamp: Date;

  /** Time taken to compute results in milliseconds */
  computeTime?: number;

  /** Number of sequences in the pool (N) */
  sequenceCount: number;

  /** α used for the Benjamini-Hochberg correction */
  fdrThreshold: number;

  /** Name of the primary null model */
  nullModel: string;

  /** Distinct motifs before and after each discovery step */
  motifCounts?: Readonly<{
    mined: number;
    afterOccurrenceFilter: number;
    afterReduction: number;
  }>;

  /** Whether composition-aware columns were computed */
  gcAdjusted?: boolean;

  /** Any warnings generated during analysis */
  warnings?: readonly string[];
}
