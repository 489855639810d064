export const name = '@leansmith/eval';

export * from './types';
export { TaskLoader, TASK_DIR_PREFIX } from './task-loader';
export { SolutionEvaluator, SHORT_PROOF_TACTICS } from './evaluator';
export { EvaluationRunner, summarize, type EvaluationRunnerOptions, type SolveFn } from './runner';
export { SimpleRenderer, type Colors } from './renderer';
