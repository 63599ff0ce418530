// beam-decode - beam search decoding over encoder-decoder models

export const VERSION = '0.1.0';

export { BeamSearchEngine } from './engine.js';
export type {
  BeamEntry,
  BeamSearchEngineOptions,
  BeamSearchResult,
  RoundSnapshot,
  SearchOptions,
} from './engine.js';

export { Translator } from './translator.js';
export type { BatchResult, TranslateOptions, TranslatorOptions } from './translator.js';

export { greedyDecode } from './greedy.js';

export { Hypothesis, hypothesisPrecedes } from './hypothesis.js';
export { TokenSequence } from './token-sequence.js';
export { BoundedHeap } from './bounded-heap.js';
export { topCandidates, validateDistribution } from './distribution.js';
export type { Candidate } from './distribution.js';

export type { DecoderOracle, EncoderOracle, StepResult, Vocabulary } from './oracle.js';

export { EndsWith, AnyEndsWith, Or, endsWith, endsWithAny } from './stop-condition.js';
export type { StopCondition } from './stop-condition.js';

export {
  BeamSearchError,
  InvalidArgumentError,
  OracleFailureError,
  EmptyVocabularyDistributionError,
  DecodeAbortedError,
  isBeamSearchError,
} from './errors.js';
export type { BeamSearchErrorCode } from './errors.js';

export {
  DecodeOptionsSchema,
  VocabularySchema,
  TranslatorOptionsSchema,
  EnvSchema,
  loadConfig,
} from './config.js';
export type { Config, DecodeOptions, LogLevel } from './config.js';

export { createLogger, logger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export { parseArgs, generateHelpText } from './args.js';
export type { ArgSchema, ArgOption, ParsedArgs } from './args.js';
