import type { LeansmithEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Whether a message at `level` passes a logger set to `threshold`. */
export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Interface for logging throughout leansmith.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventMeta(runId), type: 'AttemptStarted', payload: { attempt: 1 } });
 * logger.info('Index loaded');
 * logger.error(new Error('Failed'), 'Compilation failed');
 * const attemptLogger = logger.child({ attempt: 2 });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: LeansmithEvent): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages carry the given bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
