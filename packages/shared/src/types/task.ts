/**
 * A proof task: what to build and where the answer goes.
 * `template` carries the `{{code}}` and `{{proof}}` slots.
 */
export interface Task {
  description: string;
  template: string;
}

/** Final or best-effort answer for a task. */
export interface Solution {
  code: string;
  proof: string;
}

/**
 * How far an attempt got before it ended.
 */
export type AttemptStage =
  | 'planning'
  | 'generation'
  | 'implementation_verification'
  | 'proof_verification'
  | 'verification_timeout'
  | 'exception'
  | 'success';

export interface AttemptRecord {
  /** 1-based attempt ordinal */
  readonly index: number;
  readonly code: string;
  readonly proof: string;
  readonly stage: AttemptStage;
  readonly error?: string;
  /** True once the full implementation+proof check ran during the attempt */
  readonly reachedProofCheck: boolean;
}

/** Marker used when no implementation could be produced. */
export const PLACEHOLDER_CODE = '-- No implementation generated';

/** Unproved-obligation marker accepted by the compiler. */
export const PLACEHOLDER_PROOF = 'sorry';

export const PLACEHOLDER_SOLUTION: Readonly<Solution> = Object.freeze({
  code: PLACEHOLDER_CODE,
  proof: PLACEHOLDER_PROOF,
});
