export * from './types';
export * from './template';
export { LakeCompiler, type LakeCompilerOptions } from './lake-compiler';
export { ProofCompiler } from './proof-compiler';
