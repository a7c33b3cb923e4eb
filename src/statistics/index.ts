export { UniformNullModel, CompositionNullModel, nullModelFor, positionsPerSequence, computeExpectation } from './NullModel';
export type { NullModel } from './NullModel';
export { SignificanceTester, foldEnrichment } from './SignificanceTester';
export { benjaminiHochberg, rankOrder } from './MultipleTesting';
export type { CorrectionResult } from './MultipleTesting';
export { permutationTest, countContaining } from './PermutationTest';
export type { PermutationOptions, PermutationResult } from './PermutationTest';
