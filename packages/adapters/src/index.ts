export const name = '@leansmith/adapters';

export * from './types';
export * from './adapter';
export * from './errors';
export * from './base-adapter';
export { executeProviderRequest, nextDelayMs, retryDelayMs } from './common';
export * from './embed';
export * from './openai';
export * from './fake/adapter';
export * from './factory';
