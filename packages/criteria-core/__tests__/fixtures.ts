import type { ProfitMatrix } from '../src/types.js';
import { InvalidInputError } from '../src/types.js';

/** Four strategies against five states of nature. */
export const REFERENCE_MATRIX: ProfitMatrix = [
  [15, 10, 0, -6, 17],
  [3, 14, 8, 9, 2],
  [1, 5, 14, 20, -3],
  [7, 19, 10, 2, 0],
];

/** Run fn and return the InvalidInputError it throws. Fails on anything else. */
export function captureInvalidInput(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err;
    throw err;
  }
  throw new Error('expected InvalidInputError to be thrown');
}
