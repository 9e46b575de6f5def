export function rowMin(row: readonly number[]): number {
  return row.reduce((min, v) => (v < min ? v : min));
}

export function rowMax(row: readonly number[]): number {
  return row.reduce((max, v) => (v > max ? v : max));
}

/** Index and value of the largest score. Earliest index wins ties. */
export function argMax(scores: readonly number[]): { index: number; value: number } {
  let index = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i] > scores[index]) index = i;
  }
  return { index, value: scores[index] };
}

/** Index and value of the smallest score. Earliest index wins ties. */
export function argMin(scores: readonly number[]): { index: number; value: number } {
  let index = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i] < scores[index]) index = i;
  }
  return { index, value: scores[index] };
}
