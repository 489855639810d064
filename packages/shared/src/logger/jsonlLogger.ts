import * as fs from 'fs/promises';
import type { LeansmithEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { isLevelEnabled, type Logger, type LogLevel } from './types';
import { formatBindings } from './prefix';

/**
 * Appends one redacted JSON event per line to `filePath`.
 * Plain messages at or above `level` still go to the console.
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly level: LogLevel = 'info',
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  async log(event: LeansmithEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail the run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    if (isLevelEnabled(this.level, 'debug')) console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    if (isLevelEnabled(this.level, 'info')) console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    if (isLevelEnabled(this.level, 'warn')) console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.level, { ...this.bindings, ...bindings });
  }
}
