import type { CriterionOutcome, ProfitMatrix, RegretMatrix } from '../types.js';
import { assertMatrix } from '../validation.js';
import { argMin, rowMax } from '../utils.js';

function unsafeRegretMatrix(matrix: ProfitMatrix): RegretMatrix {
  const regret = matrix.map((row) => [...row]);
  const columns = regret[0].length;

  for (let col = 0; col < columns; col++) {
    let best = regret[0][col];
    for (let row = 1; row < regret.length; row++) {
      if (regret[row][col] > best) best = regret[row][col];
    }
    for (let row = 0; row < regret.length; row++) {
      regret[row][col] = best - regret[row][col];
    }
  }

  return regret;
}

/**
 * Regret matrix: regret[i][j] = max_k M[k][j] - M[i][j].
 * Always a new array; the input is left untouched.
 */
export function regretMatrix(matrix: ProfitMatrix): RegretMatrix {
  assertMatrix(matrix);
  return unsafeRegretMatrix(matrix);
}

/**
 * Savage (minimax regret) criterion.
 * value = min_i( max_j regret[i][j] )
 */
export function savageOutcome(matrix: ProfitMatrix): CriterionOutcome {
  assertMatrix(matrix);
  const { index, value } = argMin(unsafeRegretMatrix(matrix).map(rowMax));
  return { value, strategy: index };
}

export function savage(matrix: ProfitMatrix): number {
  return savageOutcome(matrix).value;
}
