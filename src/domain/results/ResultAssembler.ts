/**
 * Result Assembler
 *
 * Merges discovery output, per-motif tests and the corrections into the
 * final records, ordered for downstream consumption.
 */

import type { EnrichmentRecord, MotifCandidate, MotifTestResult } from '../types/analysis';
import type { CorrectionResult } from '../../statistics/MultipleTesting';
import { MotifStatError, ErrorCode } from '../../core/errors';
import { compareEnrichment } from './ordering';

export interface AssemblyInput {
  candidates: readonly MotifCandidate[];
  tests: readonly MotifTestResult[];
  correction: CorrectionResult;
  sequenceCount: number;
  /** Composition-aware p-values and their own correction, same order as candidates */
  gcAdjusted?: {
    pValues: readonly number[];
    correction: CorrectionResult;
  };
}

export function assembleRecords(input: AssemblyInput): EnrichmentRecord[] {
  const { candidates, tests, correction, sequenceCount, gcAdjusted } = input;

  const lengths = [tests.length, correction.adjusted.length, correction.significant.length];
  if (gcAdjusted) lengths.push(gcAdjusted.pValues.length, gcAdjusted.correction.adjusted.length);
  if (lengths.some((length) => length !== candidates.length)) {
    throw new MotifStatError(ErrorCode.INTERNAL_ERROR, 'Per-motif statistics are misaligned', {
      candidates: candidates.length,
      lengths,
    });
  }

  const records = candidates.map((candidate, index): EnrichmentRecord => {
    const test = tests[index];
    const record: EnrichmentRecord = {
      motif: candidate.motif,
      length: candidate.length,
      count: candidate.support.size,
      expectedCount: test.expectedCount,
      foldEnrichment: test.foldEnrichment,
      frequency: sequenceCount > 0 ? candidate.support.size / sequenceCount : 0,
      pValue: test.pValue,
      fdr: correction.adjusted[index],
      significant: correction.significant[index],
      sequences: Array.from(candidate.support).sort(),
    };

    if (!gcAdjusted) return record;
    return {
      ...record,
      pValueGcAdjusted: gcAdjusted.pValues[index],
      fdrGcAdjusted: gcAdjusted.correction.adjusted[index],
    };
  });

  return records.sort(compareEnrichment);
}
