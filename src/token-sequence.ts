/**
 * Persistent token sequence. Appending returns a new sequence that shares
 * its whole prefix with the original, so sibling hypotheses cost one node
 * each instead of a copy of the full history.
 */
export class TokenSequence {
  private constructor(
    private readonly parent: TokenSequence | null,
    readonly last: number,
    readonly length: number
  ) {}

  /**
   * Create a one-token sequence
   */
  static of(tokenId: number): TokenSequence {
    return new TokenSequence(null, tokenId, 1);
  }

  /**
   * Create from an array (must be non-empty)
   */
  static from(tokenIds: readonly number[]): TokenSequence {
    if (tokenIds.length === 0) {
      throw new RangeError('TokenSequence needs at least one token');
    }
    let seq = TokenSequence.of(tokenIds[0]);
    for (let i = 1; i < tokenIds.length; i++) {
      seq = seq.append(tokenIds[i]);
    }
    return seq;
  }

  append(tokenId: number): TokenSequence {
    return new TokenSequence(this, tokenId, this.length + 1);
  }

  /**
   * The last `n` tokens (fewer if the sequence is shorter), oldest first
   */
  tail(n: number): number[] {
    const count = Math.max(0, Math.min(n, this.length));
    const out = new Array<number>(count);
    let node: TokenSequence | null = this;
    for (let i = count - 1; i >= 0 && node !== null; i--) {
      out[i] = node.last;
      node = node.parent;
    }
    return out;
  }

  /**
   * Copy out to a regular array, oldest token first
   */
  toArray(): number[] {
    return this.tail(this.length);
  }

  *[Symbol.iterator](): Iterator<number> {
    yield* this.toArray();
  }
}
