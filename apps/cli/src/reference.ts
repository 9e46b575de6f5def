import type { ProfitMatrix } from "@payoff/criteria-core";

/** Evaluated when no matrix file is given: four strategies, five states of nature. */
export const REFERENCE_MATRIX: ProfitMatrix = [
  [15, 10, 0, -6, 17],
  [3, 14, 8, 9, 2],
  [1, 5, 14, 20, -3],
  [7, 19, 10, 2, 0],
];
