/** Profit matrix. Rows are strategies, columns are states of nature. Rectangular, at least 1×1. */
export type ProfitMatrix = readonly (readonly number[])[];

/** Regret matrix produced by the Savage criterion. Same shape as its source. */
export type RegretMatrix = number[][];

/** Scalar criterion value plus the row (strategy) that attains it. First row wins on ties. */
export interface CriterionOutcome {
  value: number;
  strategy: number;
}

/** All criteria over one matrix. */
export interface CriteriaReport {
  rows: number;
  columns: number;
  coefficient: number;
  minimax: CriterionOutcome;
  maximax: CriterionOutcome;
  savage: CriterionOutcome;
  hurwicz: CriterionOutcome;
  error?: CriteriaError;
  error_detail?: string;
}

/** Matrix and coefficient validation errors. */
export enum CriteriaError {
  EMPTY_MATRIX = 'EMPTY_MATRIX',
  EMPTY_ROW = 'EMPTY_ROW',
  RAGGED_MATRIX = 'RAGGED_MATRIX',
  NON_FINITE_VALUE = 'NON_FINITE_VALUE',
  INVALID_COEFFICIENT = 'INVALID_COEFFICIENT',
}

/** Thrown by the criterion functions when their input breaks the matrix contract. */
export class InvalidInputError extends Error {
  readonly code: CriteriaError;
  readonly detail?: string;

  constructor(code: CriteriaError, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = 'InvalidInputError';
    this.code = code;
    this.detail = detail;
  }
}
