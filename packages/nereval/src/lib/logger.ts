/**
 * Thin tagged wrapper around console.
 *
 *   const logger = createLogger('evaluate');
 *   logger.info('Word Alphabet Size: 1234');   // [evaluate] Word Alphabet Size: 1234
 *
 * Messages below the configured level are dropped; 'silent' drops everything.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const noop = () => {};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env['NEREVAL_LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(tag: string, level: LogLevel = defaultLogLevel()): Logger {
  const prefix = `[${tag}]`;
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: enabled('debug') ? (...args: unknown[]) => console.debug(prefix, ...args) : noop,
    info: enabled('info') ? (...args: unknown[]) => console.log(prefix, ...args) : noop,
    warn: enabled('warn') ? (...args: unknown[]) => console.warn(prefix, ...args) : noop,
    error: enabled('error') ? (...args: unknown[]) => console.error(prefix, ...args) : noop
  };
}

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
