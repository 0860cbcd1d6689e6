/**
 * Structured Logger
 *
 * pino JSON logger shared by the whole server:
 * - Level from LOG_LEVEL (via config)
 * - Credential-like fields redacted
 * - Optional pino-pretty transport for local development (LOG_PRETTY=true)
 */

import { pino, type Logger, type LoggerOptions } from 'pino';
import { getConfig } from '../../config/env.js';

export type { Logger };

const REDACT_PATHS = [
  'apiKey',
  'token',
  'password',
  'secret',
  'authorization',
  '*.apiKey',
  '*.token',
  '*.password',
  '*.secret',
  '*.authorization',
  'req.headers.authorization',
  'req.headers.cookie'
];

export function createLogger(options: { level: string; pretty: boolean }): Logger {
  const base: LoggerOptions = {
    level: options.level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (options.pretty) {
    return pino({
      ...base,
      transport: { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
    });
  }

  return pino(base);
}

const config = getConfig();

/**
 * Singleton logger instance
 * Tests run with NODE_ENV=test and stay silent unless LOG_LEVEL is set explicitly.
 */
export const logger: Logger = createLogger({
  level: config.env === 'test' && !process.env.LOG_LEVEL ? 'silent' : config.logLevel,
  pretty: config.logPretty
});
