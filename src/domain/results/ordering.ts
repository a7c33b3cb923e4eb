/**
 * Deterministic orderings of motif listings
 */

import type { EnrichmentRecord, MotifCandidate } from '../types/analysis';

function compareMotif(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Pre-statistics listing: count desc, length desc, motif asc
 */
export function compareCandidateListing(a: MotifCandidate, b: MotifCandidate): number {
  return (
    b.support.size - a.support.size || b.length - a.length || compareMotif(a.motif, b.motif)
  );
}

/**
 * Final table: FDR asc, raw p-value asc, motif asc
 */
export function compareEnrichment(a: EnrichmentRecord, b: EnrichmentRecord): number {
  return a.fdr - b.fdr || a.pValue - b.pValue || compareMotif(a.motif, b.motif);
}

export function rankCandidates(candidates: readonly MotifCandidate[]): MotifCandidate[] {
  return [...candidates].sort(compareCandidateListing);
}
