import winston from 'winston';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './config.js';

const { combine, timestamp, json, colorize, printf, errors } = winston.format;

const devFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  if (stack) msg += `\n${stack}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` | ${JSON.stringify(metadata)}`;
  }
  return msg;
});

export interface LoggerOptions {
  level?: LogLevel;
  production?: boolean;
  service?: string;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const production = options.production ?? false;
  return winston.createLogger({
    level: options.level ?? (production ? 'info' : 'debug'),
    format: combine(
      timestamp(),
      errors({ stack: true }),
      production ? json() : combine(colorize(), devFormat)
    ),
    defaultMeta: { service: options.service ?? 'beam-decode' },
    transports: [new winston.transports.Console()],
  });
}

// The default logger never refuses to load: bad values fall back.
const LoggerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
});

const env = LoggerEnvSchema.parse(process.env);

export const logger = createLogger({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'warn' : undefined),
  production: env.NODE_ENV === 'production',
});

export type Logger = winston.Logger;
