/**
 * Redundancy Reducer
 *
 * Drops a motif when it is a contiguous substring of an already accepted,
 * longer motif whose support set is exactly the same. Candidates are visited
 * by length descending, then motif ascending, so the surviving representatives
 * do not depend on map iteration order.
 *
 * Worst case stays O(M² × L); accepted motifs are bucketed by support set so
 * the substring check only runs against motifs that could make a candidate
 * redundant.
 */

import type { MotifCandidate } from '../domain/types/analysis';
import { checkpoint } from '../core/utils/cancellation';

/**
 * Canonical key of a support set
 */
export function supportKey(support: ReadonlySet<string>): string {
  return JSON.stringify(Array.from(support).sort());
}

/**
 * Longest first; lexicographic within a length
 */
export function compareForReduction(a: MotifCandidate, b: MotifCandidate): number {
  if (a.length !== b.length) return b.length - a.length;
  return a.motif < b.motif ? -1 : a.motif > b.motif ? 1 : 0;
}

export async function reduceRedundantMotifs(
  candidates: readonly MotifCandidate[],
  signal?: AbortSignal
): Promise<MotifCandidate[]> {
  const ordered = [...candidates].sort(compareForReduction);
  const acceptedBySupport = new Map<string, string[]>();
  const accepted: MotifCandidate[] = [];

  for (let index = 0; index < ordered.length; index++) {
    if (index % 1024 === 0) await checkpoint(signal, 'reduction');

    const candidate = ordered[index];
    const key = supportKey(candidate.support);
    const sameSupport = acceptedBySupport.get(key);

    if (sameSupport?.some((longer) => longer.includes(candidate.motif))) {
      continue;
    }

    if (sameSupport) {
      sameSupport.push(candidate.motif);
    } else {
      acceptedBySupport.set(key, [candidate.motif]);
    }
    accepted.push(candidate);
  }

  return accepted;
}
