export const name = '@leansmith/exec';

export * from './compiler';
