import type { Solution } from '@leansmith/shared';

/** A task directory loaded from disk. */
export interface EvalTask {
  /** Directory name, `task_id_*` */
  id: string;
  dir: string;
  description: string;
  /** Contents of task.lean, with `{{code}}` and `{{proof}}` slots */
  template: string;
  /** Contents of tests.lean, empty when the task has none */
  tests: string;
}

export interface EvalTaskResult {
  taskId: string;
  success: boolean;
  /** Why the solution was rejected; compiler diagnostics for a failed full check */
  error: string;
  codeCompiles: boolean;
  proofValid: boolean;
  score: number;
  output?: string;
  solution?: Solution;
  durationMs?: number;
}

export interface EvalSummary {
  total: number;
  successful: number;
  failed: number;
  /** In [0, 1]; 0 when nothing ran */
  successRate: number;
  totalScore: number;
  averageScore: number;
  failedTasks: Array<{ taskId: string; error: string }>;
}
