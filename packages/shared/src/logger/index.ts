import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { MemoryLogger } from './memoryLogger';
export type { Logger, LogLevel, MaybePromise } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, MemoryLogger };
export type { MemoryLogEntry } from './memoryLogger';
