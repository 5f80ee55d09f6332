/**
 * Logging infrastructure exports
 *
 * Structured logging with automatic redaction via pino
 */
import type pino from 'pino';

export {
  rootLogger,
  createLogger,
  componentLogger,
  resolveLogLevel,
  LOG_LEVEL_ENV,
  REDACT_PATHS,
} from './pino-setup.js';

export type Logger = pino.Logger;
