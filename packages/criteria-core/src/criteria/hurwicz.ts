import type { CriterionOutcome, ProfitMatrix } from '../types.js';
import { assertCoefficient, assertMatrix } from '../validation.js';
import { argMax, rowMax, rowMin } from '../utils.js';

/**
 * Hurwicz criterion with pessimism coefficient alpha.
 * H_i = alpha * min_j M[i][j] + (1 - alpha) * max_j M[i][j]
 * value = max_i H_i
 *
 * alpha = 1 → minimax, alpha = 0 → maximax. Not clamped to [0, 1].
 */
export function hurwiczOutcome(matrix: ProfitMatrix, coefficient: number): CriterionOutcome {
  assertMatrix(matrix);
  assertCoefficient(coefficient);
  const scores = matrix.map((row) => {
    const minOutcome = rowMin(row);
    const maxOutcome = rowMax(row);
    return coefficient * minOutcome + (1 - coefficient) * maxOutcome;
  });
  const { index, value } = argMax(scores);
  return { value, strategy: index };
}

export function hurwicz(matrix: ProfitMatrix, coefficient: number): number {
  return hurwiczOutcome(matrix, coefficient).value;
}
