import type { ProfitMatrix } from './types.js';
import { CriteriaError, InvalidInputError } from './types.js';

export interface ValidationFailure {
  error: CriteriaError;
  detail?: string;
}

export function validateShape(matrix: ProfitMatrix): ValidationFailure | null {
  if (matrix.length === 0) {
    return { error: CriteriaError.EMPTY_MATRIX };
  }
  const columns = matrix[0].length;
  for (let i = 0; i < matrix.length; i++) {
    const width = matrix[i].length;
    if (width === 0) {
      return { error: CriteriaError.EMPTY_ROW, detail: `row ${i}` };
    }
    if (width !== columns) {
      return { error: CriteriaError.RAGGED_MATRIX, detail: `row ${i} has ${width} columns, expected ${columns}` };
    }
  }
  return null;
}

export function validateValues(matrix: ProfitMatrix): ValidationFailure | null {
  for (let i = 0; i < matrix.length; i++) {
    const row = matrix[i];
    for (let j = 0; j < row.length; j++) {
      if (!Number.isFinite(row[j])) {
        return { error: CriteriaError.NON_FINITE_VALUE, detail: `[${i}][${j}]=${row[j]}` };
      }
    }
  }
  return null;
}

/** Validate a profit matrix. Returns first error found, or null. */
export function validateMatrix(matrix: ProfitMatrix): ValidationFailure | null {
  return validateShape(matrix) ?? validateValues(matrix);
}

/**
 * Only non-finite coefficients are rejected. Values outside [0, 1] are
 * accepted and extrapolate the best/worst blend.
 */
export function validateCoefficient(coefficient: number): CriteriaError | null {
  if (!Number.isFinite(coefficient)) {
    return CriteriaError.INVALID_COEFFICIENT;
  }
  return null;
}

export function assertMatrix(matrix: ProfitMatrix): void {
  const failure = validateMatrix(matrix);
  if (failure) {
    throw new InvalidInputError(failure.error, failure.detail);
  }
}

export function assertCoefficient(coefficient: number): void {
  const error = validateCoefficient(coefficient);
  if (error) {
    throw new InvalidInputError(error, `coefficient=${coefficient}`);
  }
}
