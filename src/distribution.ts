// Validation and top-k selection over dense next-token distributions.

import { BoundedHeap } from './bounded-heap.js';
import { EmptyVocabularyDistributionError, OracleFailureError } from './errors.js';

/**
 * A candidate next token drawn from a distribution.
 */
export interface Candidate {
  tokenId: number;
  prob: number;
}

/** Rounding slack allowed above 1 for single entries and for the total. */
export const PROBABILITY_TOLERANCE = 1e-4;

/**
 * Rejects distributions the engine cannot score: empty, containing NaN,
 * infinite, negative or above-one entries, or a total outside (0, 1].
 */
export function validateDistribution(probs: ArrayLike<number>, vocabSize?: number): void {
  if (vocabSize !== undefined && probs.length !== vocabSize) {
    throw new OracleFailureError(
      `Decoder returned ${probs.length} probabilities for a vocabulary of ${vocabSize}`
    );
  }
  if (probs.length === 0) {
    throw new EmptyVocabularyDistributionError('Decoder returned an empty distribution');
  }

  let total = 0;
  for (let i = 0; i < probs.length; i++) {
    const p = probs[i];
    if (!Number.isFinite(p) || p < 0 || p > 1 + PROBABILITY_TOLERANCE) {
      throw new EmptyVocabularyDistributionError(
        `Decoder returned invalid probability ${p} for token ${i}`
      );
    }
    total += p;
  }
  if (!(total > 0)) {
    throw new EmptyVocabularyDistributionError(
      `Decoder distribution sums to ${total}, expected a positive value`
    );
  }
  if (total > 1 + PROBABILITY_TOLERANCE) {
    throw new EmptyVocabularyDistributionError(
      `Decoder distribution sums to ${total}, expected at most 1`
    );
  }
}

/** Higher probability first, then lower token id. */
export function candidatePrecedes(a: Candidate, b: Candidate): boolean {
  return a.prob > b.prob || (a.prob === b.prob && a.tokenId < b.tokenId);
}

/**
 * Returns up to `k` tokens with the highest probability, best first.
 * Tokens with zero probability are never candidates.
 */
export function topCandidates(probs: ArrayLike<number>, k: number): Candidate[] {
  const heap = new BoundedHeap<Candidate>(k, candidatePrecedes);
  for (let tokenId = 0; tokenId < probs.length; tokenId++) {
    const prob = probs[tokenId];
    if (prob > 0) {
      heap.push({ tokenId, prob });
    }
  }
  return heap.drain();
}
