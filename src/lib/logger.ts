/**
 * Logger factory
 *
 * Structured JSON logging with Pino. Logs go to stderr so that stdout stays
 * free for command output (normalized configs, JSON reports).
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';
import { ENV_VARS } from '@/config/constants';
import { extractErrorMessage } from './errors';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Component name, added to every record as `name` */
  name: string;
  /** Minimum level; defaults to $LOG_LEVEL, then `info` */
  level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Check whether a string names a Pino level
 */
export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(level: LevelWithSilent | undefined): LevelWithSilent {
  if (level !== undefined) return level;
  const fromEnv = process.env[ENV_VARS.LOG_LEVEL]?.toLowerCase();
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Create a named logger writing to stderr
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: options.name,
      level: resolveLevel(options.level),
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export interface Timer {
  end(meta?: Record<string, unknown>): void;
  error(error: unknown): void;
}

/**
 * Time an operation and log its duration when it ends or fails
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const start = Date.now();
  return {
    end(meta = {}) {
      logger.debug({ operation, durationMs: Date.now() - start, ...meta }, `${operation} completed`);
    },
    error(error) {
      logger.error(
        { operation, durationMs: Date.now() - start, error: extractErrorMessage(error) },
        `${operation} failed`,
      );
    },
  };
}
