/**
 * Benjamini-Hochberg false discovery rate control
 */

export interface CorrectionResult {
  /** BH-adjusted p-values, in input order */
  adjusted: number[];
  /** Step-up rejections at the given α, in input order */
  significant: boolean[];
}

/**
 * Indices of the p-values in ascending order; equal values keep input order
 */
export function rankOrder(pValues: readonly number[]): number[] {
  return pValues
    .map((_, index) => index)
    .sort((a, b) => pValues[a] - pValues[b] || a - b);
}

/**
 * Step-up procedure over m p-values:
 * adjusted p(i) = min over j ≥ i of p(j) · m / j, capped at 1.
 * Rank i is rejected when some rank j ≥ i has p(j) ≤ (j / m) · α.
 */
export function benjaminiHochberg(pValues: readonly number[], alpha: number): CorrectionResult {
  const m = pValues.length;
  if (m === 0) {
    return { adjusted: [], significant: [] };
  }

  const order = rankOrder(pValues);
  const adjusted = new Array<number>(m);
  const significant = new Array<boolean>(m).fill(false);

  let runningMin = 1;
  let rejectUpTo = -1;

  for (let i = m - 1; i >= 0; i--) {
    const index = order[i];
    const rank = i + 1;
    const p = pValues[index];

    runningMin = Math.min(runningMin, (p * m) / rank);
    adjusted[index] = runningMin;

    if (rejectUpTo < 0 && p <= (rank / m) * alpha) {
      rejectUpTo = i;
    }
  }

  for (let i = 0; i <= rejectUpTo; i++) {
    significant[order[i]] = true;
  }

  return { adjusted, significant };
}
