// Translator - encoder oracle plus beam search, for single inputs and batches.

import PQueue from 'p-queue';
import { TranslatorOptionsSchema, parseOptions, type TranslatorSettings } from './config.js';
import { BeamSearchEngine, type SearchOptions } from './engine.js';
import { InvalidArgumentError, OracleFailureError, isBeamSearchError, type BeamSearchError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import type { DecoderOracle, EncoderOracle, Vocabulary } from './oracle.js';
import type { StopCondition } from './stop-condition.js';

export interface TranslatorOptions<S> {
  encoder: EncoderOracle<S>;
  decoder: DecoderOracle<S>;
  vocabulary: Vocabulary;
  stopCondition?: StopCondition;
  /** Default 4 */
  beamWidth?: number;
  /** Default 50 */
  maxSteps?: number;
  /** Longest accepted input, in tokens */
  maxInputLength?: number;
  /** Inputs decoded at once by translateBatch. Default 1 */
  concurrency?: number;
  logger?: Logger;
}

export interface TranslateOptions extends SearchOptions {
  beamWidth?: number;
  maxSteps?: number;
}

export type BatchResult =
  | { ok: true; tokens: number[] }
  | { ok: false; error: BeamSearchError };

export class Translator<S> {
  readonly engine: BeamSearchEngine<S>;
  private readonly encoder: EncoderOracle<S>;
  private readonly settings: TranslatorSettings;
  private readonly logger: Logger;

  constructor(options: TranslatorOptions<S>) {
    const { encoder, decoder, vocabulary, stopCondition, logger, ...rest } = options;
    this.settings = parseOptions(TranslatorOptionsSchema, rest, 'translator options');
    this.encoder = encoder;
    this.logger = logger ?? defaultLogger;
    this.engine = new BeamSearchEngine({ decoder, vocabulary, stopCondition, logger: this.logger });
  }

  /**
   * Encodes `inputTokenIds` and beam-decodes the result.
   */
  async translate(inputTokenIds: readonly number[], options: TranslateOptions = {}): Promise<number[]> {
    const { beamWidth = this.settings.beamWidth, maxSteps = this.settings.maxSteps, ...search } = options;
    const limit = this.settings.maxInputLength;
    if (limit !== undefined && inputTokenIds.length > limit) {
      throw new InvalidArgumentError(`Input has ${inputTokenIds.length} tokens, limit is ${limit}`);
    }

    let initialState: S;
    try {
      initialState = await this.encoder.encode(inputTokenIds);
    } catch (err) {
      throw new OracleFailureError(
        `Encoder failed: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
    }
    return this.engine.decode(initialState, beamWidth, maxSteps, search);
  }

  /**
   * Translates independent inputs, at most `concurrency` at a time. Results
   * keep input order; a failed input is reported in place and does not stop
   * the rest. Errors other than BeamSearchError still reject the batch.
   */
  async translateBatch(
    inputs: readonly (readonly number[])[],
    options: TranslateOptions = {}
  ): Promise<BatchResult[]> {
    const queue = new PQueue({ concurrency: this.settings.concurrency });
    const results = new Array<BatchResult>(inputs.length);

    await Promise.all(
      inputs.map((input, index) =>
        queue.add(async () => {
          try {
            results[index] = { ok: true, tokens: await this.translate(input, options) };
          } catch (err) {
            if (!isBeamSearchError(err)) throw err;
            this.logger.warn('translation failed', { index, code: err.code, error: err.message });
            results[index] = { ok: false, error: err };
          }
        })
      )
    );

    return results;
  }
}
