// Types
export type {
  ProfitMatrix,
  RegretMatrix,
  CriterionOutcome,
  CriteriaReport,
} from './types.js';
export { CriteriaError, InvalidInputError } from './types.js';
export type { ValidationFailure } from './validation.js';

// Criteria
export { minimax, minimaxOutcome, maximax, maximaxOutcome } from './criteria/minimax.js';
export { savage, savageOutcome, regretMatrix } from './criteria/savage.js';
export { hurwicz, hurwiczOutcome } from './criteria/hurwicz.js';

// Report
export { evaluateCriteria } from './report/evaluator.js';

// Validation
export { validateMatrix, validateCoefficient, assertMatrix, assertCoefficient } from './validation.js';

// Utils
export { argMax, argMin, rowMin, rowMax } from './utils.js';
