/**
 * Binomial Distribution
 *
 * Number of successes in n independent Bernoulli(p) trials. Used as the null
 * model for how many sequences of a pool contain a given motif by chance.
 */

import jStat from 'jstat';
import { MotifStatError, ErrorCode } from '../errors';

export class BinomialDistribution {
  constructor(
    private readonly n: number,
    private readonly p: number
  ) {
    if (!Number.isInteger(n) || n < 1) {
      throw new MotifStatError(
        ErrorCode.INVALID_CONFIG,
        `Invalid Binomial parameter n=${n}. Must be a positive integer.`,
        { n }
      );
    }
    if (!(p >= 0 && p <= 1)) {
      throw new MotifStatError(
        ErrorCode.INVALID_CONFIG,
        `Invalid Binomial parameter p=${p}. Must be in [0, 1].`,
        { p }
      );
    }
  }

  /**
   * P(X > x) = P(X ≥ k) for k = ⌊x⌋ + 1, which is the regularized
   * incomplete beta I_p(k, n - k + 1)
   */
  survival(x: number): number {
    if (x < 0) return 1;
    if (x >= this.n) return 0;
    if (this.p === 0) return 0;
    if (this.p === 1) return 1;

    const k = Math.floor(x) + 1;
    return jStat.ibeta(this.p, k, this.n - k + 1);
  }
}
