import type { CriterionOutcome, ProfitMatrix } from '../types.js';
import { assertMatrix } from '../validation.js';
import { argMax, rowMax, rowMin } from '../utils.js';

/**
 * Minimax (Wald) criterion: best worst case.
 * value = max_i( min_j M[i][j] )
 */
export function minimaxOutcome(matrix: ProfitMatrix): CriterionOutcome {
  assertMatrix(matrix);
  const { index, value } = argMax(matrix.map(rowMin));
  return { value, strategy: index };
}

export function minimax(matrix: ProfitMatrix): number {
  return minimaxOutcome(matrix).value;
}

/**
 * Maximax criterion: best best case.
 * value = max_i( max_j M[i][j] )
 */
export function maximaxOutcome(matrix: ProfitMatrix): CriterionOutcome {
  assertMatrix(matrix);
  const { index, value } = argMax(matrix.map(rowMax));
  return { value, strategy: index };
}

export function maximax(matrix: ProfitMatrix): number {
  return maximaxOutcome(matrix).value;
}
