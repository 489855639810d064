import type { CompileResult, ProofCompiler } from '@leansmith/exec';
import { eventMeta, type AttemptStage, type Logger } from '@leansmith/shared';
import type { ContextSource } from '../retrieval';
import type { CompilerErrorKind, Review, Stage, VerifyInput } from '../stages';

export interface VerificationOutcome {
  status: 'success' | 'failure';
  stage: Extract<
    AttemptStage,
    'success' | 'implementation_verification' | 'proof_verification' | 'verification_timeout'
  >;
  code: string;
  proof: string;
  error?: string;
  /** Rounds started, at most `maxRounds` */
  rounds: number;
  reachedProofCheck: boolean;
}

export interface VerificationLoopOptions {
  compiler: ProofCompiler;
  verifyStage: Stage<VerifyInput, Review>;
  retrieval: ContextSource;
  logger: Logger;
  runId: string;
  maxRounds: number;
  /** Retrieval chunks requested for each repair */
  contextChunks: number;
}

/**
 * Text to hand to the repair stage. Lean reports most diagnostics on
 * stdout, so both streams are kept.
 */
export function compilerDiagnostics(result: CompileResult): string {
  const text = [result.error, result.output]
    .map((s) => s.trim())
    .filter(Boolean)
    .join('\n');
  return text || `Compiler exited with code ${result.exitCode}`;
}

/**
 * Implementation check, then full check, with a repair between failing
 * checks. Every round consumes one unit of the budget; a failure in the
 * last round ends the loop without asking for a repair that could not be
 * checked.
 */
export class VerificationLoop {
  constructor(private readonly options: VerificationLoopOptions) {}

  async run(template: string, initialCode: string, initialProof: string): Promise<VerificationOutcome> {
    const { compiler, maxRounds } = this.options;
    let code = initialCode;
    let proof = initialProof;
    let reachedProofCheck = false;
    let lastError = '';
    let round = 0;

    while (round < maxRounds) {
      round++;
      await this.emitRoundStarted(round);

      const impl = await compiler.checkImplementation(template, code);
      let check: 'implementation' | 'full' = 'implementation';
      let failure: CompileResult = impl;

      if (impl.success) {
        reachedProofCheck = true;
        check = 'full';
        const full = await compiler.checkFullSolution(template, code, proof);
        if (full.success) {
          await this.emitRoundFinished(round, check, true, false);
          return { status: 'success', stage: 'success', code, proof, rounds: round, reachedProofCheck };
        }
        failure = full;
      }

      lastError = compilerDiagnostics(failure);
      if (round >= maxRounds) {
        await this.emitRoundFinished(round, check, false, false);
        break;
      }

      const errorType: CompilerErrorKind = check === 'implementation' ? 'implementation' : 'proof';
      const review = await this.requestRepair(code, proof, lastError, errorType);
      const repaired = Boolean(review?.corrected_code || review?.corrected_proof);
      await this.emitRoundFinished(round, check, false, repaired);

      if (!repaired) {
        return {
          status: 'failure',
          stage: errorType === 'implementation' ? 'implementation_verification' : 'proof_verification',
          code,
          proof,
          error: lastError,
          rounds: round,
          reachedProofCheck,
        };
      }
      code = review?.corrected_code ?? code;
      proof = review?.corrected_proof ?? proof;
    }

    return {
      status: 'failure',
      stage: 'verification_timeout',
      code,
      proof,
      error: `Exceeded maximum verification rounds (${maxRounds})${lastError ? `\n${lastError}` : ''}`,
      rounds: round,
      reachedProofCheck,
    };
  }

  private async requestRepair(
    code: string,
    proof: string,
    error: string,
    errorType: CompilerErrorKind,
  ): Promise<Review | undefined> {
    const context = await this.options.retrieval.getContext(
      `Lean 4 error debugging ${errorType} ${error.slice(0, 200)}`,
      this.options.contextChunks,
    );
    const result = await this.options.verifyStage.process({ code, proof, error, errorType, context });
    if (result.kind === 'failed') {
      await this.options.logger.warn(result.error);
      return undefined;
    }
    return result.value;
  }

  private async emitRoundStarted(round: number): Promise<void> {
    await this.options.logger.log({
      ...eventMeta(this.options.runId),
      type: 'VerificationRoundStarted',
      payload: { round, maxRounds: this.options.maxRounds, check: 'implementation' },
    });
  }

  private async emitRoundFinished(
    round: number,
    check: 'implementation' | 'full',
    success: boolean,
    repaired: boolean,
  ): Promise<void> {
    await this.options.logger.log({
      ...eventMeta(this.options.runId),
      type: 'VerificationRoundFinished',
      payload: { round, check, success, repaired },
    });
  }
}
