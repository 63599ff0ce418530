import { describe, it, expect } from 'vitest';
import { topCandidates, validateDistribution } from '../distribution.js';
import { EmptyVocabularyDistributionError, OracleFailureError } from '../errors.js';

describe('topCandidates', () => {
  it('should rank by descending probability', () => {
    expect(topCandidates([0, 0.6, 0.3, 0.1], 2)).toEqual([
      { tokenId: 1, prob: 0.6 },
      { tokenId: 2, prob: 0.3 },
    ]);
  });

  it('should break ties by ascending token id', () => {
    expect(topCandidates([0.25, 0.25, 0.25, 0.25], 2).map((c) => c.tokenId)).toEqual([0, 1]);
    expect(topCandidates([0.1, 0.45, 0.45], 1)).toEqual([{ tokenId: 1, prob: 0.45 }]);
  });

  it('should never offer zero-probability tokens', () => {
    expect(topCandidates([0, 0, 0, 1], 3)).toEqual([{ tokenId: 3, prob: 1 }]);
  });

  it('should accept typed arrays', () => {
    const probs = new Float64Array([0.2, 0.5, 0.3]);
    expect(topCandidates(probs, 3).map((c) => c.tokenId)).toEqual([1, 2, 0]);
  });
});

describe('validateDistribution', () => {
  it('should accept a distribution with positive mass', () => {
    expect(() => validateDistribution([0, 0.6, 0.3, 0.1])).not.toThrow();
    expect(() => validateDistribution([0, 0.6, 0.3, 0.1], 4)).not.toThrow();
  });

  it('should reject an empty distribution', () => {
    expect(() => validateDistribution([])).toThrow(EmptyVocabularyDistributionError);
  });

  it('should reject a distribution that sums to zero', () => {
    expect(() => validateDistribution([0, 0, 0])).toThrow(
      'Decoder distribution sums to 0, expected a positive value'
    );
  });

  it('should reject NaN and negative entries', () => {
    expect(() => validateDistribution([Number.NaN, 1])).toThrow(
      'Decoder returned invalid probability NaN for token 0'
    );
    expect(() => validateDistribution([0.5, -0.1, 0.6])).toThrow(
      'Decoder returned invalid probability -0.1 for token 1'
    );
    expect(() => validateDistribution([Number.POSITIVE_INFINITY])).toThrow(EmptyVocabularyDistributionError);
  });

  it('should reject entries above 1', () => {
    expect(() => validateDistribution([0, 2.5, 0.5, 0])).toThrow(
      'Decoder returned invalid probability 2.5 for token 1'
    );
  });

  it('should reject a total above 1', () => {
    expect(() => validateDistribution([0.7, 0.7])).toThrow('Decoder distribution sums to 1.4, expected at most 1');
  });

  it('should allow rounding slack above 1', () => {
    expect(() => validateDistribution([1 + 1e-7])).not.toThrow();
    expect(() => validateDistribution([0.5, 0.5 + 1e-6])).not.toThrow();
  });

  it('should treat a size mismatch as an oracle failure', () => {
    expect(() => validateDistribution([0.5, 0.5], 3)).toThrow(OracleFailureError);
    expect(() => validateDistribution([0.5, 0.5], 3)).toThrow(
      'Decoder returned 2 probabilities for a vocabulary of 3'
    );
  });
});
