/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * Pino writes one JSON object per log line, which keeps a long comparison run
 * greppable and machine-parseable. In development the output is piped through
 * `pino-pretty` for colors and readable timestamps.
 *
 * API keys travel through request params and headers, so they are redacted
 * wherever a log call might carry them.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly — tests pass a silent instance.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  redact: {
    paths: ['key', 'apiKey', '*.key', '*.apiKey', 'headers["X-Goog-Api-Key"]'],
    censor: '[redacted]',
  },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
