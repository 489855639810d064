import {
  PLACEHOLDER_CODE,
  PLACEHOLDER_PROOF,
  PLACEHOLDER_SOLUTION,
  type AttemptRecord,
  type Solution,
} from '@leansmith/shared';

const NO_IMPLEMENTATION_MARKER = '-- No implementation';

export function scoreAttempt(record: AttemptRecord): number {
  let score = 0;
  if (record.code.trim() && !record.code.includes(NO_IMPLEMENTATION_MARKER)) {
    score += 2;
  }
  if (record.proof.trim() && record.proof.trim() !== PLACEHOLDER_PROOF) {
    score += 1;
  }
  if (record.reachedProofCheck || record.stage === 'proof_verification') {
    score += 1;
  }
  return score;
}

/**
 * Highest-scoring attempt; the earliest one wins a tie. Empty fields are
 * filled with the placeholder pair.
 */
export function selectBestEffort(attempts: readonly AttemptRecord[]): Solution {
  let best: AttemptRecord | undefined;
  let bestScore = -1;

  for (const attempt of attempts) {
    const score = scoreAttempt(attempt);
    if (score > bestScore) {
      best = attempt;
      bestScore = score;
    }
  }

  if (!best) {
    return { ...PLACEHOLDER_SOLUTION };
  }
  return {
    code: best.code.trim() ? best.code : PLACEHOLDER_CODE,
    proof: best.proof.trim() ? best.proof : PLACEHOLDER_PROOF,
  };
}
