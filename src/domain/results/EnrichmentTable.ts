/**
 * Ranked, read-only table of motif enrichment statistics
 *
 * Several consumers (heatmaps, top-N logos, exporters) derive their own
 * summaries from the same table, so records and arrays are frozen.
 */

import { AnalysisResult } from './AnalysisResult';
import type { ResultMetadata } from './ResultMetadata';
import type { EnrichmentRecord } from '../types/analysis';

export const ENRICHMENT_COLUMNS = [
  'Motif',
  'Length',
  'Count',
  'Expected_Count',
  'Fold_Enrichment',
  'Frequency',
  'P_value',
  'FDR',
  'Significant',
  'Sequences',
] as const;

export const GC_ADJUSTED_COLUMNS = ['P_value_GC_adjusted', 'FDR_GC_adjusted'] as const;

export type EnrichmentColumn =
  | (typeof ENRICHMENT_COLUMNS)[number]
  | (typeof GC_ADJUSTED_COLUMNS)[number];

export interface EnrichmentSummary {
  totalSequences: number;
  motifsFound: number;
  significantMotifs: number;
  fdrThreshold: number;
}

/**
 * JSON form of a record; infinite fold enrichment becomes the string 'Infinity'
 */
export type SerializedEnrichmentRecord = Omit<EnrichmentRecord, 'foldEnrichment'> & {
  foldEnrichment: number | 'Infinity';
};

function formatNumber(value: number | undefined): string {
  if (value === undefined) return '';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}

export class EnrichmentTable extends AnalysisResult {
  private readonly records: readonly EnrichmentRecord[];

  constructor(records: readonly EnrichmentRecord[], metadata: ResultMetadata) {
    super(metadata);
    this.records = Object.freeze(
      records.map((record) =>
        Object.freeze({ ...record, sequences: Object.freeze([...record.sequences]) })
      )
    );
  }

  get size(): number {
    return this.records.length;
  }

  getRecords(): readonly EnrichmentRecord[] {
    return this.records;
  }

  find(motif: string): EnrichmentRecord | undefined {
    return this.records.find((record) => record.motif === motif);
  }

  /**
   * First n records of the ranked table
   */
  top(n: number): readonly EnrichmentRecord[] {
    return this.records.slice(0, Math.max(0, n));
  }

  /**
   * Records flagged by the Benjamini-Hochberg procedure at the configured α
   */
  significant(): readonly EnrichmentRecord[] {
    return this.records.filter((record) => record.significant);
  }

  /**
   * Records whose adjusted value is strictly below a threshold other than α
   */
  countBelowFdr(threshold: number): number {
    return this.records.filter((record) => record.fdr < threshold).length;
  }

  summary(): EnrichmentSummary {
    return {
      totalSequences: this.metadata.sequenceCount,
      motifsFound: this.records.length,
      significantMotifs: this.significant().length,
      fdrThreshold: this.metadata.fdrThreshold,
    };
  }

  columns(): EnrichmentColumn[] {
    return this.metadata.gcAdjusted
      ? [...ENRICHMENT_COLUMNS, ...GC_ADJUSTED_COLUMNS]
      : [...ENRICHMENT_COLUMNS];
  }

  toJSON(): {
    metadata: Omit<ResultMetadata, 'timestamp'> & { timestamp: string };
    columns: EnrichmentColumn[];
    records: SerializedEnrichmentRecord[];
  } {
    return {
      metadata: { ...this.metadata, timestamp: this.metadata.timestamp.toISOString() },
      columns: this.columns(),
      records: this.records.map((record) => ({
        ...record,
        foldEnrichment: Number.isFinite(record.foldEnrichment) ? record.foldEnrichment : 'Infinity',
      })),
    };
  }

  protected exportCSV(): string {
    const gc = this.metadata.gcAdjusted === true;
    const rows = [this.columns().join(',')];

    for (const record of this.records) {
      const fields = [
        this.csvField(record.motif),
        String(record.length),
        String(record.count),
        formatNumber(record.expectedCount),
        formatNumber(record.foldEnrichment),
        formatNumber(record.frequency),
        formatNumber(record.pValue),
        formatNumber(record.fdr),
        record.significant ? 'True' : 'False',
        this.csvField(record.sequences.join(',')),
      ];
      if (gc) {
        fields.push(formatNumber(record.pValueGcAdjusted), formatNumber(record.fdrGcAdjusted));
      }
      rows.push(fields.join(','));
    }

    return rows.join('\n');
  }
}
