/**
 * Core Data Model exports
 */

export type {
  Nucleotide,
  BaseProbabilities,
  SequenceRecord,
  SequencePool,
  PoolSummary,
  SequenceInput,
} from './SequencePool';

export {
  NUCLEOTIDES,
  UNIFORM_BASE_PROBABILITIES,
  isNucleotide,
  SequencePoolFactory,
  PoolStatistics,
  createSequencePool,
  isSequencePool,
} from './SequencePool';
