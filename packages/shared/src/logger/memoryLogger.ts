import type { LeansmithEvent } from '../types/events';
import type { Logger } from './types';
import { formatBindings } from './prefix';

export interface MemoryLogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  error?: Error;
}

/**
 * Keeps events and messages in memory. Children share the parent's buffers.
 */
export class MemoryLogger implements Logger {
  readonly events: LeansmithEvent[];
  readonly entries: MemoryLogEntry[];

  constructor(
    private readonly bindings: Record<string, unknown> = {},
    buffers?: { events: LeansmithEvent[]; entries: MemoryLogEntry[] },
  ) {
    this.events = buffers?.events ?? [];
    this.entries = buffers?.entries ?? [];
  }

  log(event: LeansmithEvent): void {
    this.events.push(event);
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message: formatBindings(this.bindings, message) });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message: formatBindings(this.bindings, message) });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message: formatBindings(this.bindings, message) });
  }

  error(error: Error, message?: string): void {
    this.entries.push({
      level: 'error',
      message: formatBindings(this.bindings, message ?? error.message),
      error,
    });
  }

  child(bindings: Record<string, unknown>): Logger {
    return new MemoryLogger({ ...this.bindings, ...bindings }, this);
  }

  /** Events of one type, in emission order. */
  eventsOfType<T extends LeansmithEvent['type']>(type: T): Extract<LeansmithEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<LeansmithEvent, { type: T }> => e.type === type);
  }
}
