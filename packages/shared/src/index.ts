export const name = '@leansmith/shared';

export * from './errors';
export * from './types/events';
export * from './types/llm';
export * from './types/task';
export * from './logger';
export * from './redaction';
export * from './json-utils';
export * from './lru-cache';
export * from './fs/io';
export * from './config/schema';
