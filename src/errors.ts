// Error kinds raised by the decoder. Every failure surfaces to the caller of
// decode(); nothing here retries.

export type BeamSearchErrorCode =
  | 'INVALID_ARGUMENT'
  | 'ORACLE_FAILURE'
  | 'EMPTY_VOCABULARY_DISTRIBUTION'
  | 'ABORTED';

/**
 * Base class for every error thrown by this package.
 */
export class BeamSearchError extends Error {
  constructor(
    readonly code: BeamSearchErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A width, step limit or option object failed validation.
 * Raised before any oracle is called.
 */
export class InvalidArgumentError extends BeamSearchError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/**
 * The encoder or decoder oracle threw, rejected, or returned something malformed.
 */
export class OracleFailureError extends BeamSearchError {
  constructor(message: string, cause?: unknown) {
    super('ORACLE_FAILURE', message, cause === undefined ? undefined : { cause });
  }
}

/**
 * The decoder returned a distribution with no usable probability mass.
 */
export class EmptyVocabularyDistributionError extends BeamSearchError {
  constructor(message: string) {
    super('EMPTY_VOCABULARY_DISTRIBUTION', message);
  }
}

/**
 * The caller's AbortSignal fired; raised between rounds.
 */
export class DecodeAbortedError extends BeamSearchError {
  constructor(round: number) {
    super('ABORTED', `Decode aborted before round ${round}`);
  }
}

/** True for any error raised by this package. */
export function isBeamSearchError(value: unknown): value is BeamSearchError {
  return value instanceof BeamSearchError;
}
