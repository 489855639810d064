import type { AttemptRecord, Task } from '@leansmith/shared';

export type StageName = 'plan' | 'generate' | 'verify';

/**
 * Outcome of one stage call. `fallback` carries a value recovered from a
 * response that did not match the stage schema; `failed` means the
 * provider call itself failed.
 */
export type StageResult<O> =
  | { kind: 'parsed'; value: O; raw: string }
  | { kind: 'fallback'; value: O; raw: string; reason: string }
  | { kind: 'failed'; error: string };

export interface Stage<I, O> {
  readonly name: StageName;
  process(input: I): Promise<StageResult<O>>;
}

export interface PlanInput {
  task: Task;
  /** Rendered retrieval context, possibly empty */
  context: string;
  previousAttempts: readonly AttemptRecord[];
  errorSignatures: readonly string[];
}

export interface GenerateInput {
  task: Task;
  /** Raw plan text as returned by the plan stage */
  plan: string;
  context: string;
  previousAttempts: readonly AttemptRecord[];
  attemptNumber: number;
}

export type CompilerErrorKind = 'implementation' | 'proof';

export interface VerifyInput {
  code: string;
  proof: string;
  /** Compiler diagnostics; empty means there is nothing to repair */
  error: string;
  errorType: CompilerErrorKind;
  context: string;
}
