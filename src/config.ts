// Option schemas and environment configuration, validated with zod.

import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

const positiveInt = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be >= 1`);

const tokenId = (name: string) =>
  z.number().int(`${name} must be an integer`).nonnegative(`${name} must be >= 0`);

export const DecodeOptionsSchema = z.object({
  beamWidth: positiveInt('beamWidth'),
  maxSteps: positiveInt('maxSteps'),
});

export const VocabularySchema = z
  .object({
    startTokenId: tokenId('startTokenId'),
    stopTokenId: tokenId('stopTokenId'),
    size: positiveInt('size').optional(),
  })
  .refine(
    (v) => v.size === undefined || (v.startTokenId < v.size && v.stopTokenId < v.size),
    { message: 'startTokenId and stopTokenId must be below the vocabulary size' }
  );

export const TranslatorOptionsSchema = z.object({
  beamWidth: positiveInt('beamWidth').default(4),
  maxSteps: positiveInt('maxSteps').default(50),
  maxInputLength: positiveInt('maxInputLength').optional(),
  concurrency: positiveInt('concurrency').default(1),
});

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  BEAM_WIDTH: z.coerce.number().int().positive().default(4),
  MAX_STEPS: z.coerce.number().int().positive().default(50),
  DECODE_CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export type DecodeOptions = z.infer<typeof DecodeOptionsSchema>;
export type TranslatorSettings = z.infer<typeof TranslatorOptionsSchema>;
export type Config = z.infer<typeof EnvSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Joins zod issues into one line, e.g. "beamWidth: beamWidth must be >= 1".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parses `value` with `schema`, raising InvalidArgumentError on failure.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid ${what}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Reads decoder settings from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return parseOptions(EnvSchema, env, 'environment configuration');
}
