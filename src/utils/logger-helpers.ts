/**
 * Logger Helpers
 *
 * Pino logger construction plus lazy evaluation of log context objects, so
 * expensive context (directory listings, snapshots) is only built when the
 * level is enabled.
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LoggerLevelSetting = LogLevel | 'silent';

type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export const LOG_LEVEL_ENV = 'ENGINE_BUILD_LOG_LEVEL';

const LEVELS: readonly LoggerLevelSetting[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevelSetting(value: string): value is LoggerLevelSetting {
  return LEVELS.some((level) => level === value);
}

/**
 * Pick the effective level: environment override, then config, then `info`.
 */
export function resolveLogLevel(
  configured: LoggerLevelSetting | undefined,
  env: Readonly<Record<string, string | undefined>> = process.env
): LoggerLevelSetting {
  const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (fromEnv && isLevelSetting(fromEnv)) {
    return fromEnv;
  }
  return configured ?? 'info';
}

export interface CreateLoggerOptions {
  level?: LoggerLevelSetting;
  name?: string;
  /** Write to stderr so stdout stays clean for CLI output */
  stderr?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const config = { level: options.level ?? 'info', name: options.name ?? 'engine-build' };
  return options.stderr ? pino(config, pino.destination(2)) : pino(config);
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ files: listing }), 'Remote listing');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
