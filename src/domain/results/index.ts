/**
 * Result objects for motif enrichment analysis
 */

export { AnalysisResult } from './AnalysisResult';
export type { ResultMetadata } from './ResultMetadata';
export { EnrichmentTable, ENRICHMENT_COLUMNS, GC_ADJUSTED_COLUMNS } from './EnrichmentTable';
export type {
  EnrichmentColumn,
  EnrichmentSummary,
  SerializedEnrichmentRecord,
} from './EnrichmentTable';
export { assembleRecords } from './ResultAssembler';
export type { AssemblyInput } from './ResultAssembler';
export { compareCandidateListing, compareEnrichment, rankCandidates } from './ordering';
