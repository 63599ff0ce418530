// Fake oracles shared by the tests.

import { vi } from 'vitest';
import { createLogger } from '../logger.js';
import type { StepResult } from '../oracle.js';

export const START = 0;
export const A = 1;
export const B = 2;
export const STOP = 3;

export const vocabulary = { startTokenId: START, stopTokenId: STOP };

export const quietLogger = createLogger({ level: 'error' });

/**
 * Decoder whose state is the round number: round r returns table[r], or the
 * last row once the table runs out.
 */
export function roundTableDecoder(table: number[][]) {
  return {
    step: vi.fn((_previous: number, round: number): StepResult<number> => ({
      probs: table[Math.min(round, table.length - 1)],
      state: round + 1,
    })),
  };
}

/**
 * Decoder whose distribution depends only on the previous token.
 */
export function markovDecoder(rows: number[][]) {
  return {
    step: vi.fn((previous: number, state: null): StepResult<null> => ({
      probs: rows[previous],
      state,
    })),
  };
}

/**
 * Deterministic pseudo-random transition table. Token 0 (the start token)
 * never receives probability.
 */
export function randomRows(vocabSize: number, seed: number): number[][] {
  let s = seed;
  const next = () => {
    s = (s * 16807) % 2147483647;
    return s / 2147483647;
  };
  return Array.from({ length: vocabSize }, () => {
    const weights = Array.from({ length: vocabSize }, (_, id) => (id === 0 ? 0 : next() + 0.01));
    const total = weights.reduce((a, b) => a + b, 0);
    return weights.map((w) => w / total);
  });
}
