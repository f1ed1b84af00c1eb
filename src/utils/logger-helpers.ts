/**
 * Logger Helpers
 *
 * Process logger construction plus lazy evaluation of log context objects:
 * context is only built when the log level is actually enabled, which keeps
 * per-request routing and metrics paths cheap.
 */

import { destination, pino, type Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LevelWithSilent = LogLevel | 'silent';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && LEVELS.some((level) => level === value);
}

/**
 * Create the process logger
 *
 * Level precedence: LOG_LEVEL environment variable, then the configured
 * level, then 'info'. Output goes to stderr so command output on stdout
 * stays machine-readable.
 *
 * @param configuredLevel - Level from configuration (logging.level)
 */
export function createLogger(configuredLevel?: LevelWithSilent): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = isLevel(envLevel) ? envLevel : configuredLevel ?? 'info';

  return pino({ name: 'agent-canary', level }, destination(2));
}

type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level (trace, debug, info, warn, error, fatal)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ agentName, variant }), 'Routed request');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger) {
    return;
  }

  if (!logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
