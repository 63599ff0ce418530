// Hypothesis - one candidate output sequence tracked by the engine.

import { TokenSequence } from './token-sequence.js';
import type { StopCondition } from './stop-condition.js';

/**
 * An immutable partial or finished output sequence.
 *
 * `score` is the accumulated negative log-probability of every token after
 * the start token (lower is better). `seq` is the order in which the engine
 * created the hypothesis within one decode call and breaks score ties.
 */
export class Hypothesis<S> {
  private constructor(
    readonly tokens: TokenSequence,
    readonly score: number,
    readonly state: S,
    readonly isLive: boolean,
    readonly seq: number
  ) {}

  /**
   * The start-only hypothesis every decode begins from
   */
  static initial<S>(startTokenId: number, state: S, seq = 0): Hypothesis<S> {
    return new Hypothesis(TokenSequence.of(startTokenId), 0, state, true, seq);
  }

  get lastToken(): number {
    return this.tokens.last;
  }

  /**
   * Child hypothesis with `tokenId` appended. The child owns `state`; the
   * parent is left untouched. `prob` is capped at 1 so the score never drops.
   */
  extend(
    tokenId: number,
    prob: number,
    state: S,
    isTerminal: StopCondition,
    seq: number
  ): Hypothesis<S> {
    const tokens = this.tokens.append(tokenId);
    return new Hypothesis(
      tokens,
      this.score - Math.log(Math.min(prob, 1)),
      state,
      !isTerminal.check(tokens),
      seq
    );
  }
}

/**
 * Ranking used for pruning: lower score first, then earlier creation.
 */
export function hypothesisPrecedes<S>(a: Hypothesis<S>, b: Hypothesis<S>): boolean {
  return a.score < b.score || (a.score === b.score && a.seq < b.seq);
}
