export { KmerMiner, validRunLengths, toCandidates } from './KmerMiner';
export type { SupportMap, MinerOptions } from './KmerMiner';
export { reduceRedundantMotifs, compareForReduction, supportKey } from './RedundancyReducer';
export { findMotifPositions, buildPresenceMatrix, consensusSequence } from './MotifScanner';
export type { PresenceMatrix } from './MotifScanner';
