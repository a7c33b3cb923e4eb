/**
 * Probability distributions used by the null models
 */

export { BinomialDistribution } from './BinomialDistribution';
