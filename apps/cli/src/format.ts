const SIGNIFICANT_DIGITS = 6;

/**
 * Round to 6 significant digits and drop trailing zeros: 4.3999999999999995 → "4.4".
 * Output stays in fixed notation for large and small magnitudes (1234567 → "1234570",
 * 1e-5 → "0.00001"); exponent form only appears where String(number) uses it.
 */
export function formatValue(value: number): string {
  return String(Number(value.toPrecision(SIGNIFICANT_DIGITS)));
}

export interface CriteriaValues {
  minimax: number;
  savage: number;
  hurwicz: number;
}

export function formatResults(values: CriteriaValues): string[] {
  return [
    `Minimax: ${formatValue(values.minimax)}`,
    `Savage: ${formatValue(values.savage)}`,
    `Hurwicz: ${formatValue(values.hurwicz)}`,
  ];
}
