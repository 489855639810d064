export const name = '@leansmith/cli';

export { createProgram, defaultDeps } from './program';
export { exitCodeFor, formatError } from './errors';
export { OutputRenderer } from './output/renderer';
export type { CliDeps, GlobalOptions } from './types';
