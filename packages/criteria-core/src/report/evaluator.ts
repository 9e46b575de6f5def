import type { CriteriaReport, CriterionOutcome, ProfitMatrix } from '../types.js';
import { validateCoefficient, validateMatrix } from '../validation.js';
import { maximaxOutcome, minimaxOutcome } from '../criteria/minimax.js';
import { savageOutcome } from '../criteria/savage.js';
import { hurwiczOutcome } from '../criteria/hurwicz.js';

const EMPTY_OUTCOME: CriterionOutcome = { value: 0, strategy: -1 };

/**
 * Evaluate every criterion over one matrix.
 *
 * Never throws on bad input: the first validation error is returned in
 * `error` / `error_detail` with every outcome zeroed and strategy -1.
 */
export function evaluateCriteria(matrix: ProfitMatrix, coefficient: number): CriteriaReport {
  const matrixError = validateMatrix(matrix);
  const coefficientError = validateCoefficient(coefficient);
  const failure = matrixError ?? (coefficientError ? { error: coefficientError, detail: `coefficient=${coefficient}` } : null);

  if (failure) {
    return {
      rows: matrix.length,
      columns: matrix.length > 0 ? matrix[0].length : 0,
      coefficient,
      minimax: { ...EMPTY_OUTCOME },
      maximax: { ...EMPTY_OUTCOME },
      savage: { ...EMPTY_OUTCOME },
      hurwicz: { ...EMPTY_OUTCOME },
      error: failure.error,
      error_detail: failure.detail,
    };
  }

  return {
    rows: matrix.length,
    columns: matrix[0].length,
    coefficient,
    minimax: minimaxOutcome(matrix),
    maximax: maximaxOutcome(matrix),
    savage: savageOutcome(matrix),
    hurwicz: hurwiczOutcome(matrix, coefficient),
  };
}
