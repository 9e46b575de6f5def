/** Pessimism weight used when a caller does not supply one. */
export const DEFAULT_HURWICZ_COEFFICIENT = 0.8;
