/**
 * Special mathematical functions
 */

/**
 * 1 - (1 - p)^n, accurate for tiny p
 */
export function probabilityAtLeastOnce(p: number, n: number): number {
  if (p <= 0 || n <= 0) return 0;
  if (p >= 1) return 1;
  return -Math.expm1(n * Math.log1p(-p));
}
