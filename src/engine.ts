// BeamSearchEngine - width-bounded autoregressive decoding over a decoder oracle.

import { BoundedHeap } from './bounded-heap.js';
import { DecodeOptionsSchema, VocabularySchema, parseOptions } from './config.js';
import { topCandidates } from './distribution.js';
import { DecodeAbortedError } from './errors.js';
import { Hypothesis, hypothesisPrecedes } from './hypothesis.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { runDecoderStep, type DecoderOracle, type Vocabulary } from './oracle.js';
import { endsWith, type StopCondition } from './stop-condition.js';

/**
 * Plain view of a hypothesis handed to callers.
 */
export interface BeamEntry {
  tokens: number[];
  score: number;
  /** True once the hypothesis emitted a stop token */
  finished: boolean;
}

export interface BeamSearchResult extends BeamEntry {
  /** Rounds actually run, at most maxSteps */
  rounds: number;
  /** Final working set, best first */
  beam: BeamEntry[];
}

/**
 * Working set after a completed round.
 */
export interface RoundSnapshot {
  round: number;
  beam: BeamEntry[];
}

export interface SearchOptions {
  /** Checked before every round; aborting rejects with DecodeAbortedError */
  signal?: AbortSignal;
  /** Called after every completed round */
  onRound?: (snapshot: RoundSnapshot) => void;
}

export interface BeamSearchEngineOptions<S> {
  decoder: DecoderOracle<S>;
  vocabulary: Vocabulary;
  /** Extra terminal patterns, OR-ed with the stop token */
  stopCondition?: StopCondition;
  logger?: Logger;
}

function toEntry<S>(h: Hypothesis<S>): BeamEntry {
  return { tokens: h.tokens.toArray(), score: h.score, finished: !h.isLive };
}

/**
 * Beam search over an opaque decoder.
 *
 * Each round every live hypothesis asks the decoder for its next-token
 * distribution and spawns up to `beamWidth` children; finished hypotheses
 * are carried over as they are. The merged set is cut back to the
 * `beamWidth` lowest scores. Scores are sums of negative log-probabilities
 * and are not length-normalized, so shorter finished sequences are favoured
 * as the width grows.
 *
 * A single engine may serve any number of concurrent decode calls; each call
 * owns its own working set.
 *
 * @example
 * ```ts
 * const engine = new BeamSearchEngine({ decoder, vocabulary: { startTokenId: 0, stopTokenId: 3 } });
 * const tokens = await engine.decode(await encoder.encode(input), 4, 50);
 * ```
 */
export class BeamSearchEngine<S> {
  readonly vocabulary: Vocabulary;
  private readonly decoder: DecoderOracle<S>;
  private readonly isTerminal: StopCondition;
  private readonly logger: Logger;

  constructor(options: BeamSearchEngineOptions<S>) {
    this.vocabulary = parseOptions(VocabularySchema, options.vocabulary, 'vocabulary');
    this.decoder = options.decoder;
    const stopToken = endsWith([this.vocabulary.stopTokenId]);
    this.isTerminal = options.stopCondition ? stopToken.or(options.stopCondition) : stopToken;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Decodes and returns the best token sequence, start token included.
   */
  async decode(
    initialState: S,
    beamWidth: number,
    maxSteps: number,
    options: SearchOptions = {}
  ): Promise<number[]> {
    const result = await this.search(initialState, beamWidth, maxSteps, options);
    return result.tokens;
  }

  /**
   * Decodes and returns the best sequence together with the final beam.
   */
  async search(
    initialState: S,
    beamWidth: number,
    maxSteps: number,
    options: SearchOptions = {}
  ): Promise<BeamSearchResult> {
    parseOptions(DecodeOptionsSchema, { beamWidth, maxSteps }, 'decode options');
    const { signal, onRound } = options;

    let seq = 0;
    let beam: Hypothesis<S>[] = [Hypothesis.initial(this.vocabulary.startTokenId, initialState, seq++)];
    let rounds = 0;

    while (rounds < maxSteps && beam.some((h) => h.isLive)) {
      if (signal?.aborted) {
        throw new DecodeAbortedError(rounds + 1);
      }

      // Expansions are independent; the merge below waits for all of them.
      const steps = await Promise.all(
        beam.map((h) =>
          h.isLive
            ? runDecoderStep(this.decoder, h.lastToken, h.state, this.vocabulary.size)
            : Promise.resolve(null)
        )
      );

      const pruned = new BoundedHeap<Hypothesis<S>>(beamWidth, hypothesisPrecedes);
      for (let i = 0; i < beam.length; i++) {
        const parent = beam[i];
        const step = steps[i];
        if (step === null) {
          pruned.push(parent);
          continue;
        }
        for (const { tokenId, prob } of topCandidates(step.probs, beamWidth)) {
          pruned.push(parent.extend(tokenId, prob, step.state, this.isTerminal, seq++));
        }
      }

      beam = pruned.drain();
      rounds++;

      if (this.logger.isDebugEnabled()) {
        this.logger.debug('beam search round complete', {
          round: rounds,
          live: beam.filter((h) => h.isLive).length,
          bestScore: beam[0].score,
        });
      }
      onRound?.({ round: rounds, beam: beam.map(toEntry) });
    }

    const entries = beam.map(toEntry);
    return { ...entries[0], rounds, beam: entries };
  }
}
