// Contracts for the encoder and decoder networks. The engine never looks
// inside the state values these produce.

import { validateDistribution } from './distribution.js';
import { OracleFailureError } from './errors.js';

/**
 * Output of a single decoder step.
 */
export interface StepResult<S> {
  /** Probability of each token id, indexed by id */
  probs: ArrayLike<number>;
  /** Decoder state after consuming the previous token */
  state: S;
}

/**
 * Reduces an input token sequence to the decoder's initial state.
 */
export interface EncoderOracle<S> {
  encode(inputTokenIds: readonly number[]): S | Promise<S>;
}

/**
 * Consumes one token plus state and predicts the next token.
 */
export interface DecoderOracle<S> {
  step(previousTokenId: number, state: S): StepResult<S> | Promise<StepResult<S>>;
}

/**
 * Target-side vocabulary ids the engine needs to know about.
 */
export interface Vocabulary {
  startTokenId: number;
  stopTokenId: number;
  /** When set, every distribution must have exactly this many entries */
  size?: number;
}

/**
 * Runs one decoder step, turning any throw or rejection into
 * OracleFailureError and rejecting unusable distributions.
 */
export async function runDecoderStep<S>(
  decoder: DecoderOracle<S>,
  previousTokenId: number,
  state: S,
  vocabSize?: number
): Promise<StepResult<S>> {
  let result: StepResult<S>;
  try {
    result = await decoder.step(previousTokenId, state);
  } catch (err) {
    throw new OracleFailureError(
      `Decoder step failed after token ${previousTokenId}: ${err instanceof Error ? err.message : String(err)}`,
      err
    );
  }
  if (typeof result !== 'object' || result === null || result.probs === undefined) {
    throw new OracleFailureError(`Decoder step after token ${previousTokenId} returned no distribution`);
  }
  validateDistribution(result.probs, vocabSize);
  return result;
}
