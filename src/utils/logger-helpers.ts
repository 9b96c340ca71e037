/**
 * Logger Helpers
 *
 * Logger factory and lazy evaluation of log context objects: context is only
 * built when the level is enabled, so per-condition debug output costs
 * nothing in a normal run.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

const LEVELS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Environment variable that overrides the default log level
 */
export const LOG_LEVEL_ENV = 'BOUNDARY_LOG_LEVEL';

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.has(value);
}

/**
 * Create the analysis logger.
 *
 * Precedence: explicit level, then BOUNDARY_LOG_LEVEL, then 'info'.
 */
export function createLogger(level?: LevelWithSilent, name = 'boundary-analysis'): Logger {
  const envLevel = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  const resolved = level ?? (envLevel && isLevel(envLevel) ? envLevel : 'info');
  return pino({ name, level: resolved });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ condition, removed }), 'Outliers removed');
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
