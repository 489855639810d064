import { compilerDiagnostics } from '@leansmith/core';
import type { ProofCompiler } from '@leansmith/exec';
import { errorMessage, type Solution } from '@leansmith/shared';
import type { EvalTask, EvalTaskResult } from './types';

/** Tactics that make a short proof acceptable. */
export const SHORT_PROOF_TACTICS = ['rfl', 'simp', 'omega', 'norm_num', 'ring'] as const;

const MIN_PROOF_LENGTH = 10;

function rejected(taskId: string, error: string): EvalTaskResult {
  return { taskId, success: false, error, codeCompiles: false, proofValid: false, score: 0 };
}

/**
 * Scores a solution against its task: cheap textual checks first, then the
 * implementation with the proof left open, then the whole solution.
 */
export class SolutionEvaluator {
  constructor(private readonly compiler: ProofCompiler) {}

  async evaluate(task: EvalTask, solution: Solution): Promise<EvalTaskResult> {
    const { code, proof } = solution;

    if (!code || !proof) {
      return rejected(task.id, 'Missing code or proof');
    }
    if (proof.toLowerCase().includes('sorry')) {
      return rejected(task.id, 'Sorry placeholder detected');
    }
    const lowerProof = proof.toLowerCase();
    if (proof.trim().length < MIN_PROOF_LENGTH && !SHORT_PROOF_TACTICS.some((t) => lowerProof.includes(t))) {
      return rejected(task.id, 'Trivial or placeholder proof detected');
    }

    try {
      const implementation = await this.compiler.checkImplementation(task.template, code);
      if (!implementation.success) {
        return rejected(task.id, `Implementation failed: ${compilerDiagnostics(implementation)}`);
      }

      const full = await this.compiler.checkFullSolution(task.template, code, proof);
      return {
        taskId: task.id,
        success: full.success,
        error: full.error,
        codeCompiles: true,
        proofValid: full.success,
        score: full.success ? 1 : 0,
        output: full.output,
      };
    } catch (error) {
      return rejected(task.id, `Evaluation failed: ${errorMessage(error)}`);
    }
  }
}
