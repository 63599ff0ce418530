// StopCondition - decides when a hypothesis has finished.
// The engine always stops on the vocabulary's stop token; these conditions
// add further terminal patterns such as multi-token stop sequences.

import type { TokenSequence } from './token-sequence.js';

/**
 * A predicate over a hypothesis's token sequence. Once it returns true the
 * hypothesis is terminal and is never expanded again.
 */
export interface StopCondition {
  check(tokens: TokenSequence): boolean;

  /**
   * Combines this condition with another using a logical OR.
   * Example: endsWith([stopId]).or(endsWith([dot, dot, dot]))
   */
  or(other: StopCondition): Or;
}

/**
 * Matches when the sequence ends with a specific run of tokens.
 * An empty run never matches.
 */
export class EndsWith implements StopCondition {
  private readonly suffix: readonly number[];

  constructor(suffix: readonly number[]) {
    this.suffix = [...suffix];
  }

  check(tokens: TokenSequence): boolean {
    const n = this.suffix.length;
    if (n === 0 || tokens.length < n) {
      return false;
    }
    if (n === 1) {
      return tokens.last === this.suffix[0];
    }
    const tail = tokens.tail(n);
    return tail.every((tokenId, i) => tokenId === this.suffix[i]);
  }

  or(other: StopCondition): Or {
    return new Or(this, other);
  }
}

/**
 * Matches when the sequence ends with any of several runs.
 */
export class AnyEndsWith implements StopCondition {
  private readonly conditions: EndsWith[];

  constructor(suffixes: readonly (readonly number[])[]) {
    this.conditions = suffixes.map((suffix) => new EndsWith(suffix));
  }

  check(tokens: TokenSequence): boolean {
    return this.conditions.some((c) => c.check(tokens));
  }

  or(other: StopCondition): Or {
    return new Or(this, other);
  }
}

export class Or implements StopCondition {
  constructor(
    private readonly first: StopCondition,
    private readonly second: StopCondition
  ) {}

  check(tokens: TokenSequence): boolean {
    return this.first.check(tokens) || this.second.check(tokens);
  }

  or(other: StopCondition): Or {
    return new Or(this, other);
  }
}

export function endsWith(suffix: readonly number[]): EndsWith {
  return new EndsWith(suffix);
}

export function endsWithAny(suffixes: readonly (readonly number[])[]): AnyEndsWith {
  return new AnyEndsWith(suffixes);
}
