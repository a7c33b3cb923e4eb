/**
 * Motif Enrichment Pipeline
 *
 * sequences → mining → occurrence filter → redundancy reduction
 *   → per-motif null model + binomial test → BH correction → ranked table
 *
 * Every run takes its own pool and configuration and returns a fresh table;
 * nothing persists between runs. Mining, reduction and the stage boundaries
 * yield to the event loop so that an AbortSignal (including
 * AbortSignal.timeout) can stop a long run.
 */

import type { SequenceInput, SequencePool } from '../core/data/SequencePool';
import {
  PoolStatistics,
  createSequencePool,
  isNucleotide,
  isSequencePool,
} from '../core/data/SequencePool';
import type { AnalysisConfig, MotifCandidate, RunOptions } from '../domain/types/analysis';
import { resolveConfig } from '../domain/validation/ConfigValidator';
import { KmerMiner } from '../discovery/KmerMiner';
import type { SupportMap } from '../discovery/KmerMiner';
import { toCandidates } from '../discovery/KmerMiner';
import { reduceRedundantMotifs } from '../discovery/RedundancyReducer';
import { rankCandidates } from '../domain/results/ordering';
import { assembleRecords } from '../domain/results/ResultAssembler';
import type { AssemblyInput } from '../domain/results/ResultAssembler';
import { EnrichmentTable } from '../domain/results/EnrichmentTable';
import type { ResultMetadata } from '../domain/results/ResultMetadata';
import { CompositionNullModel, nullModelFor } from '../statistics/NullModel';
import type { NullModel } from '../statistics/NullModel';
import { SignificanceTester } from '../statistics/SignificanceTester';
import { benjaminiHochberg } from '../statistics/MultipleTesting';
import { checkpoint, throwIfAborted } from '../core/utils/cancellation';

/**
 * Output of the discovery stages, before any statistics
 */
export interface DiscoveryResult {
  /** Reduced candidates ordered by count desc, length desc, motif asc */
  candidates: MotifCandidate[];
  minedCount: number;
  filteredCount: number;
}

export class MotifEnrichmentPipeline {
  readonly config: Readonly<AnalysisConfig>;

  constructor(
    config: Partial<AnalysisConfig> = {},
    private readonly options: RunOptions = {}
  ) {
    this.config = Object.freeze(resolveConfig(config));
  }

  /**
   * Full analysis of one sequence pool
   */
  async run(input: SequenceInput | SequencePool): Promise<EnrichmentTable> {
    const start = Date.now();
    const pool = isSequencePool(input) ? input : createSequencePool(input);
    const warnings = this.inspectPool(pool);

    // Fails before mining on an empty pool
    const gcModel = this.options.gcAdjusted
      ? new CompositionNullModel(PoolStatistics.estimateGcComposition(pool), 'gc-adjusted')
      : undefined;

    const discovery = await this.discover(pool);
    await checkpoint(this.options.signal, 'testing');

    const table = this.analyze(discovery.candidates, pool.size, {
      gcModel,
      warnings,
      motifCounts: {
        mined: discovery.minedCount,
        afterOccurrenceFilter: discovery.filteredCount,
        afterReduction: discovery.candidates.length,
      },
      start,
    });

    this.log(
      `${table.size} motifs tested, ${table.summary().significantMotifs} significant at FDR ≤ ${this.config.fdrThreshold}`
    );
    return table;
  }

  /**
   * Mining, occurrence filter and redundancy reduction
   */
  async discover(pool: SequencePool): Promise<DiscoveryResult> {
    const { minLength, maxLength } = this.config;
    const { signal, maxCandidates, onProgress } = this.options;
    const miner = new KmerMiner(this.config, { signal, maxCandidates, onProgress });

    const support: SupportMap = new Map();
    for (let k = minLength; k <= maxLength; k++) {
      miner.mineLength(pool, k, support);
      await checkpoint(signal, 'mining');
    }

    const filtered = miner.filterByOccurrence(support);
    this.log(`mined ${support.size} distinct motifs, ${filtered.size} shared by ≥ ${this.config.minOccurrences} sequences`);

    const reduced = await reduceRedundantMotifs(toCandidates(filtered), signal);
    onProgress?.({ stage: 'reduction', progress: 1 });
    this.log(`${reduced.length} motifs left after redundancy reduction`);

    return {
      candidates: rankCandidates(reduced),
      minedCount: support.size,
      filteredCount: filtered.size,
    };
  }

  /**
   * Null model, binomial test and BH correction over discovered candidates
   */
  analyze(
    candidates: readonly MotifCandidate[],
    sequenceCount: number,
    extras: {
      gcModel?: NullModel;
      warnings?: readonly string[];
      motifCounts?: ResultMetadata['motifCounts'];
      start?: number;
    } = {}
  ): EnrichmentTable {
    const { signal, onProgress } = this.options;
    const primaryModel = nullModelFor(this.config.baseProbabilities);
    const warnings = [...(extras.warnings ?? [])];
    const metadata: ResultMetadata = {
      timestamp: new Date(),
      sequenceCount,
      fdrThreshold: this.config.fdrThreshold,
      nullModel: primaryModel.name,
      motifCounts: extras.motifCounts,
      gcAdjusted: extras.gcModel !== undefined,
      warnings,
    };

    if (candidates.length === 0) {
      return new EnrichmentTable([], {
        ...metadata,
        computeTime: extras.start !== undefined ? Date.now() - extras.start : undefined,
      });
    }

    const tester = new SignificanceTester(primaryModel, this.config.randomRegionLength, sequenceCount);
    const tests = candidates.map((candidate) => tester.test(candidate));
    onProgress?.({ stage: 'testing', progress: 1 });

    throwIfAborted(signal, 'correction');
    const correction = benjaminiHochberg(
      tests.map((test) => test.pValue),
      this.config.fdrThreshold
    );
    onProgress?.({ stage: 'correction', progress: 1 });

    const assembly: AssemblyInput = { candidates, tests, correction, sequenceCount };

    if (extras.gcModel) {
      const gcTester = new SignificanceTester(
        extras.gcModel,
        this.config.randomRegionLength,
        sequenceCount
      );
      const pValues = candidates.map((candidate) => gcTester.test(candidate).pValue);
      assembly.gcAdjusted = {
        pValues,
        correction: benjaminiHochberg(pValues, this.config.fdrThreshold),
      };
    }

    const records = assembleRecords(assembly);
    onProgress?.({ stage: 'assembly', progress: 1 });

    if (records.some((record) => record.foldEnrichment === Infinity)) {
      warnings.push('Some motifs have an expected count of 0; fold enrichment is infinite');
    }

    return new EnrichmentTable(records, {
      ...metadata,
      computeTime: extras.start !== undefined ? Date.now() - extras.start : undefined,
    });
  }

  private inspectPool(pool: SequencePool): string[] {
    const warnings: string[] = [];
    let withInvalid = 0;
    let longer = 0;

    for (const { sequence } of pool.records) {
      if (sequence.length > this.config.randomRegionLength) longer++;
      for (const char of sequence) {
        if (!isNucleotide(char)) {
          withInvalid++;
          break;
        }
      }
    }

    if (pool.size === 0) {
      warnings.push('Sequence pool is empty');
    }
    if (withInvalid > 0) {
      warnings.push(`${withInvalid} sequences contain characters outside A/C/G/T; those windows are skipped`);
    }
    if (longer > 0) {
      warnings.push(
        `${longer} sequences are longer than the random region length of ${this.config.randomRegionLength}`
      );
    }

    for (const warning of warnings) this.warn(warning);
    return warnings;
  }

  private log(message: string): void {
    if (this.options.verbose) console.log(`[motifstat] ${message}`);
  }

  private warn(message: string): void {
    if (this.options.verbose) console.warn(`[motifstat] ${message}`);
  }
}

/**
 * One-shot analysis with a fresh pipeline
 */
export async function analyzeMotifs(
  sequences: SequenceInput | SequencePool,
  config: Partial<AnalysisConfig> = {},
  options: RunOptions = {}
): Promise<EnrichmentTable> {
  return new MotifEnrichmentPipeline(config, options).run(sequences);
}
