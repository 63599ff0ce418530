// Reference greedy decoder: always take the single most probable token.

import { DecodeOptionsSchema, VocabularySchema, parseOptions } from './config.js';
import { topCandidates } from './distribution.js';
import { DecodeAbortedError } from './errors.js';
import { runDecoderStep, type DecoderOracle, type Vocabulary } from './oracle.js';

/**
 * Decodes by arg-max at every step (ties go to the lower token id), stopping
 * after the stop token or `maxSteps` generated tokens. Beam search with a
 * width of 1 produces the same sequence.
 */
export async function greedyDecode<S>(
  decoder: DecoderOracle<S>,
  vocabulary: Vocabulary,
  initialState: S,
  maxSteps: number,
  options: { signal?: AbortSignal } = {}
): Promise<number[]> {
  const vocab = parseOptions(VocabularySchema, vocabulary, 'vocabulary');
  parseOptions(DecodeOptionsSchema, { beamWidth: 1, maxSteps }, 'decode options');

  const tokens = [vocab.startTokenId];
  let state = initialState;

  for (let round = 1; round <= maxSteps; round++) {
    if (options.signal?.aborted) {
      throw new DecodeAbortedError(round);
    }
    const previous = tokens[tokens.length - 1];
    const result = await runDecoderStep(decoder, previous, state, vocab.size);

    const [best] = topCandidates(result.probs, 1);
    tokens.push(best.tokenId);
    state = result.state;
    if (best.tokenId === vocab.stopTokenId) {
      break;
    }
  }

  return tokens;
}
