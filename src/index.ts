/**
 * motifstat - shared motif discovery with statistical enrichment
 *
 * Mines k-mers shared across a pool of sequences, collapses redundant nested
 * motifs, and scores each survivor against a binomial null model with
 * Benjamini-Hochberg false discovery rate control.
 */

// Error handling
export { MotifStatError, ErrorCode, isMotifStatError, wrapError } from './core/errors';

// Mathematical utilities
export { probabilityAtLeastOnce } from './core/math/special';

// Random number generation
export { RNG } from './core/math/random';

// Distributions
export { BinomialDistribution } from './core/distributions';

// Data structures
export * from './core/data';

// Domain types and configuration
export type {
  AnalysisConfig,
  MotifCandidate,
  NullExpectation,
  MotifTestResult,
  EnrichmentRecord,
  RunProgress,
  RunOptions,
} from './domain/types/analysis';
export {
  ConfigValidator,
  DEFAULT_ANALYSIS_CONFIG,
  resolveConfig,
} from './domain/validation/ConfigValidator';

// Discovery
export * from './discovery';

// Statistics
export * from './statistics';

// Results
export * from './domain/results';

// Pipeline
export { MotifEnrichmentPipeline, analyzeMotifs } from './pipeline/MotifEnrichmentPipeline';
export type { DiscoveryResult } from './pipeline/MotifEnrichmentPipeline';

// Version
export const VERSION = '0.1.0';
