import { describe, expect, it } from 'vitest';
import { hurwicz, maximax, minimax, regretMatrix, savage } from '../src/index.js';
import type { ProfitMatrix } from '../src/index.js';
import { REFERENCE_MATRIX } from './fixtures.js';

const TOL = 1e-9;

function expectClose(actual: number, expected: number) {
  expect(Math.abs(actual - expected)).toBeLessThanOrEqual(TOL);
}

/** Deterministic LCG so property checks are reproducible. */
function makeRandom(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function generateMatrices(count: number, seed: number): number[][][] {
  const random = makeRandom(seed);
  const matrices: number[][][] = [];
  for (let n = 0; n < count; n++) {
    const rows = 1 + Math.floor(random() * 6);
    const columns = 1 + Math.floor(random() * 6);
    matrices.push(
      // "+ 0" folds -0 into 0 so strict equality checks are stable
      Array.from({ length: rows }, () =>
        Array.from({ length: columns }, () => Math.round((random() * 200 - 100) * 100) / 100 + 0),
      ),
    );
  }
  return matrices;
}

function bruteMinimax(m: ProfitMatrix): number {
  return Math.max(...m.map((row) => Math.min(...row)));
}

function bruteMaximax(m: ProfitMatrix): number {
  return Math.max(...m.map((row) => Math.max(...row)));
}

describe('Conformance: reference matrix', () => {
  it('Minimax = 2, Savage = 15, Hurwicz(0.8) = 4.4', () => {
    expect(minimax(REFERENCE_MATRIX)).toBe(2);
    expect(savage(REFERENCE_MATRIX)).toBe(15);
    expectClose(hurwicz(REFERENCE_MATRIX, 0.8), 4.4);
  });
});

describe('Conformance: properties over generated matrices', () => {
  const matrices = generateMatrices(200, 20240601);

  it('minimax equals max over rows of row minimum', () => {
    for (const m of matrices) {
      expect(minimax(m)).toBe(bruteMinimax(m));
    }
  });

  it('savage never mutates its input', () => {
    for (const m of matrices) {
      const copy = m.map((row) => [...row]);
      savage(m);
      expect(m).toEqual(copy);
    }
  });

  it('hurwicz(M, 1) equals minimax(M)', () => {
    for (const m of matrices) {
      expect(hurwicz(m, 1)).toBe(minimax(m));
    }
  });

  it('hurwicz(M, 0) equals max over rows of row maximum', () => {
    for (const m of matrices) {
      expect(hurwicz(m, 0)).toBe(bruteMaximax(m));
      expect(maximax(m)).toBe(bruteMaximax(m));
    }
  });

  it('hurwicz lies between minimax and maximax for alpha in [0, 1]', () => {
    for (const m of matrices) {
      const h = hurwicz(m, 0.3);
      expect(h).toBeGreaterThanOrEqual(minimax(m) - TOL);
      expect(h).toBeLessThanOrEqual(maximax(m) + TOL);
    }
  });

  it('regrets are non-negative and every column has a zero', () => {
    for (const m of matrices) {
      const regret = regretMatrix(m);
      for (let j = 0; j < regret[0].length; j++) {
        const column = regret.map((row) => row[j]);
        expect(Math.min(...column)).toBe(0);
      }
      expect(savage(m)).toBeGreaterThanOrEqual(0);
    }
  });

  it('1x1 matrix: minimax and hurwicz return v, savage returns 0', () => {
    for (const v of [-7.25, 0, 3, 1e6]) {
      expect(minimax([[v]])).toBe(v);
      expectClose(hurwicz([[v]], 0.5), v);
      expect(savage([[v]])).toBe(0);
    }
  });
});
