import type { AttemptStage } from './task';

/**
 * Base interface for all leansmith events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the workflow run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a workflow run starts. */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    description: string;
    maxAttempts: number;
    maxVerificationRounds: number;
  };
}

/** Emitted once per run, after the final pair has been chosen. */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    status: 'success' | 'best_effort';
    attempts: number;
    durationMs: number;
  };
}

export interface AttemptStarted extends BaseEvent {
  type: 'AttemptStarted';
  payload: {
    attempt: number;
  };
}

export interface AttemptFinished extends BaseEvent {
  type: 'AttemptFinished';
  payload: {
    attempt: number;
    stage: AttemptStage;
    error?: string;
    /** Error signature added to the accumulated set, when one was derived */
    signature?: string;
  };
}

/** Emitted after a stage adapter answers, whichever variant it produced. */
export interface StageCompleted extends BaseEvent {
  type: 'StageCompleted';
  payload: {
    stage: 'plan' | 'generate' | 'verify';
    outcome: 'parsed' | 'fallback' | 'failed';
    reason?: string;
  };
}

export interface VerificationRoundStarted extends BaseEvent {
  type: 'VerificationRoundStarted';
  payload: {
    round: number;
    maxRounds: number;
    check: 'implementation' | 'full';
  };
}

export interface VerificationRoundFinished extends BaseEvent {
  type: 'VerificationRoundFinished';
  payload: {
    round: number;
    check: 'implementation' | 'full';
    success: boolean;
    repaired: boolean;
  };
}

/**
 * Emitted when a provider API request is initiated.
 */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/**
 * Emitted when a provider API request completes (success or failure).
 */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    /** Number of retry attempts made (0 = succeeded on first try) */
    retries: number;
  };
}

/** Emitted when the compiler subprocess exits or is killed */
export interface CompilationFinished extends BaseEvent {
  type: 'CompilationFinished';
  payload: {
    fileName: string;
    success: boolean;
    exitCode: number;
    durationMs: number;
    timedOut: boolean;
  };
}

export interface IndexLoaded extends BaseEvent {
  type: 'IndexLoaded';
  payload: {
    source: 'disk' | 'corpus';
    chunkCount: number;
    documentCount: number;
    durationMs: number;
  };
}

export interface IndexUpdated extends BaseEvent {
  type: 'IndexUpdated';
  payload: {
    source: string;
    addedChunks: number;
    totalChunks: number;
  };
}

/** A batch could not be embedded and was filled with zero vectors */
export interface EmbeddingBatchFailed extends BaseEvent {
  type: 'EmbeddingBatchFailed';
  payload: {
    batchIndex: number;
    batchSize: number;
    dims: number;
    error: string;
  };
}

/** Emitted when semantic search completes successfully */
export interface SemanticSearchFinished extends BaseEvent {
  type: 'SemanticSearchFinished';
  payload: {
    query: string;
    topK: number;
    hitCount: number;
    candidateCount: number;
    durationMs: number;
  };
}

export interface SemanticSearchFailed extends BaseEvent {
  type: 'SemanticSearchFailed';
  payload: {
    query: string;
    error: string;
  };
}

export type LeansmithEvent =
  | RunStarted
  | RunFinished
  | AttemptStarted
  | AttemptFinished
  | StageCompleted
  | VerificationRoundStarted
  | VerificationRoundFinished
  | ProviderRequestStarted
  | ProviderRequestFinished
  | CompilationFinished
  | IndexLoaded
  | IndexUpdated
  | EmbeddingBatchFailed
  | SemanticSearchFinished
  | SemanticSearchFailed;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event. Spread it into the event literal:
 * `{ ...eventMeta(runId), type: 'AttemptStarted', payload: { attempt: 1 } }`.
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
