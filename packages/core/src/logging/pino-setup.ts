/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Relay connections carry credentials in arbitrary custom headers, so every
 * header value is censored. Tokens and fixed trust material keys are
 * censored by path as well before anything is written.
 */

import pino from 'pino';

export const LOG_LEVEL_ENV = 'LOCAL_RELAY_LOG_LEVEL';

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export const REDACT_PATHS = [
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',
  'headers.*',
  '*.headers.*',
  'token',
  '*.token',
  'access_token',
  '*.access_token',
  'passphrase',
  '*.passphrase',
  'key',
  '*.key',
  'pfx',
  '*.pfx',
];

/**
 * Reads the log level from LOCAL_RELAY_LOG_LEVEL, falling back to 'info'.
 * @param env - Environment to read from
 * @public
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): pino.LevelWithSilent {
  const requested = (env[LOG_LEVEL_ENV] ?? '').toLowerCase();
  const match = LEVELS.find((level) => level === requested);
  return match ?? 'info';
}

/**
 * Creates a logger with the shared redaction rules.
 * @param options - Extra pino options, merged over the defaults
 * @param destination - Optional destination stream (tests capture output here)
 * @public
 */
export function createLogger(
  options: pino.LoggerOptions = {},
  destination?: pino.DestinationStream,
): pino.Logger {
  const merged: pino.LoggerOptions = {
    name: 'local-relay',
    level: resolveLogLevel(),
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
      remove: false,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    ...options,
  };
  return destination ? pino(merged, destination) : pino(merged);
}

/**
 * Root logger instance. Components derive children via {@link componentLogger}.
 * @public
 */
const rootLogger = createLogger();

/**
 * Returns a child logger tagged with the component name.
 * @param component - Component label, e.g. 'transport'
 * @param parent - Logger to derive from, the root logger by default
 * @public
 */
export function componentLogger(
  component: string,
  parent: pino.Logger = rootLogger,
): pino.Logger {
  return parent.child({ component });
}

export { rootLogger };
