import type { AttemptRecord, Task } from '@leansmith/shared';

/**
 * State threaded through one run. Never mutated: `recordAttempt` returns
 * the next context.
 */
export interface AccumulationContext {
  readonly task: Task;
  readonly attempts: readonly AttemptRecord[];
  readonly errorSignatures: ReadonlySet<string>;
}

const SIGNATURE_LINES = 3;
const SIGNATURE_MAX_LENGTH = 200;

export function createContext(task: Task): AccumulationContext {
  return Object.freeze({ task, attempts: Object.freeze([]), errorSignatures: new Set<string>() });
}

/**
 * Short fingerprint of an error: the lines among the first three that carry
 * an `error:` marker, joined and capped.
 */
export function errorSignature(error: string): string {
  return error
    .split('\n')
    .slice(0, SIGNATURE_LINES)
    .filter((line) => line.toLowerCase().includes('error:'))
    .map((line) => line.trim())
    .join(' | ')
    .slice(0, SIGNATURE_MAX_LENGTH);
}

/**
 * Appends `record` and folds its error signature into the set.
 */
export function recordAttempt(ctx: AccumulationContext, record: AttemptRecord): AccumulationContext {
  const signatures = new Set(ctx.errorSignatures);
  const signature = record.error ? errorSignature(record.error) : '';
  if (signature) {
    signatures.add(signature);
  }
  return Object.freeze({
    task: ctx.task,
    attempts: Object.freeze([...ctx.attempts, Object.freeze({ ...record })]),
    errorSignatures: signatures,
  });
}
