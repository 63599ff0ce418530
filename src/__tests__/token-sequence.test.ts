import { describe, it, expect } from 'vitest';
import { TokenSequence } from '../token-sequence.js';

describe('TokenSequence', () => {
  it('should start with a single token', () => {
    const seq = TokenSequence.of(7);
    expect(seq.length).toBe(1);
    expect(seq.last).toBe(7);
    expect(seq.toArray()).toEqual([7]);
  });

  it('should append without changing the original', () => {
    const base = TokenSequence.from([0, 1]);
    const left = base.append(2);
    const right = base.append(3);

    expect(base.toArray()).toEqual([0, 1]);
    expect(left.toArray()).toEqual([0, 1, 2]);
    expect(right.toArray()).toEqual([0, 1, 3]);
    expect(left.length).toBe(3);
    expect(right.last).toBe(3);
  });

  it('should return the last n tokens oldest first', () => {
    const seq = TokenSequence.from([5, 6, 7, 8]);
    expect(seq.tail(2)).toEqual([7, 8]);
    expect(seq.tail(0)).toEqual([]);
    expect(seq.tail(10)).toEqual([5, 6, 7, 8]);
  });

  it('should be iterable', () => {
    expect([...TokenSequence.from([1, 2, 3])]).toEqual([1, 2, 3]);
  });

  it('should reject an empty array', () => {
    expect(() => TokenSequence.from([])).toThrow(RangeError);
  });
});
