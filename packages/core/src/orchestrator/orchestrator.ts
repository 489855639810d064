import {
  errorMessage,
  eventMeta,
  type AttemptRecord,
  type Logger,
  type Solution,
  type Task,
} from '@leansmith/shared';
import type { ContextSource } from '../retrieval';
import type { Generated, GenerateInput, Plan, PlanInput, Stage } from '../stages';
import type { VerificationLoop } from '../verification';
import { selectBestEffort } from './best-effort';
import { createContext, errorSignature, recordAttempt, type AccumulationContext } from './context';

export interface AttemptOrchestratorOptions {
  planStage: Stage<PlanInput, Plan>;
  generateStage: Stage<GenerateInput, Generated>;
  verificationLoop: Pick<VerificationLoop, 'run'>;
  retrieval: ContextSource;
  logger: Logger;
  runId: string;
  maxAttempts: number;
  maxVerificationRounds: number;
  contextChunks: { plan: number; generate: number };
}

/** What is known about an attempt so far, for records of attempts that throw. */
interface AttemptProgress {
  code: string;
  proof: string;
}

/**
 * Runs Plan, Generate and the verification loop once per attempt until one
 * succeeds or the attempt budget is spent, then returns the best partial
 * result. `solve` does not throw for failures inside an attempt.
 */
export class AttemptOrchestrator {
  constructor(private readonly options: AttemptOrchestratorOptions) {}

  async solve(task: Task): Promise<Solution> {
    const { logger, runId, maxAttempts } = this.options;
    const started = Date.now();
    let ctx = createContext(task);

    await logger.log({
      ...eventMeta(runId),
      type: 'RunStarted',
      payload: {
        description: task.description,
        maxAttempts,
        maxVerificationRounds: this.options.maxVerificationRounds,
      },
    });

    let attempt = 0;
    while (attempt < maxAttempts) {
      attempt++;
      await logger.log({ ...eventMeta(runId), type: 'AttemptStarted', payload: { attempt } });

      const progress: AttemptProgress = { code: '', proof: '' };
      let record: AttemptRecord;
      try {
        record = await this.runAttempt(ctx, attempt, progress);
      } catch (error) {
        const message = errorMessage(error);
        await logger.warn(`Attempt ${attempt} failed with an exception: ${message}`);
        record = {
          index: attempt,
          code: progress.code,
          proof: progress.proof,
          stage: 'exception',
          error: message,
          reachedProofCheck: false,
        };
      }

      if (record.stage === 'success') {
        await logger.log({
          ...eventMeta(runId),
          type: 'AttemptFinished',
          payload: { attempt, stage: record.stage },
        });
        await logger.log({
          ...eventMeta(runId),
          type: 'RunFinished',
          payload: { status: 'success', attempts: attempt, durationMs: Date.now() - started },
        });
        return { code: record.code, proof: record.proof };
      }

      ctx = recordAttempt(ctx, record);
      const signature = record.error ? errorSignature(record.error) : '';
      await logger.log({
        ...eventMeta(runId),
        type: 'AttemptFinished',
        payload: {
          attempt,
          stage: record.stage,
          ...(record.error !== undefined ? { error: record.error } : {}),
          ...(signature ? { signature } : {}),
        },
      });
    }

    await logger.info(`All ${maxAttempts} attempts failed, returning the best effort`);
    await logger.log({
      ...eventMeta(runId),
      type: 'RunFinished',
      payload: { status: 'best_effort', attempts: attempt, durationMs: Date.now() - started },
    });
    return selectBestEffort(ctx.attempts);
  }

  private async runAttempt(
    ctx: AccumulationContext,
    attempt: number,
    progress: AttemptProgress,
  ): Promise<AttemptRecord> {
    const { retrieval, contextChunks } = this.options;
    const { task } = ctx;

    const planContext = await retrieval.getContext(
      `Lean 4 planning strategy ${task.description}`,
      contextChunks.plan,
    );
    const plan = await this.options.planStage.process({
      task,
      context: planContext,
      previousAttempts: ctx.attempts.slice(-3),
      errorSignatures: [...ctx.errorSignatures],
    });
    if (plan.kind === 'failed') {
      return { index: attempt, code: '', proof: '', stage: 'planning', error: plan.error, reachedProofCheck: false };
    }

    const generateContext = await retrieval.getContext(
      `Lean 4 code proof ${task.description} ${plan.raw}`,
      contextChunks.generate,
    );
    const generated = await this.options.generateStage.process({
      task,
      plan: plan.raw,
      context: generateContext,
      previousAttempts: ctx.attempts.slice(-2),
      attemptNumber: attempt,
    });
    if (generated.kind === 'failed') {
      return {
        index: attempt,
        code: '',
        proof: '',
        stage: 'generation',
        error: generated.error,
        reachedProofCheck: false,
      };
    }

    progress.code = generated.value.code;
    progress.proof = generated.value.proof;

    const outcome = await this.options.verificationLoop.run(
      task.template,
      generated.value.code,
      generated.value.proof,
    );
    return {
      index: attempt,
      code: outcome.code,
      proof: outcome.proof,
      stage: outcome.stage,
      ...(outcome.error !== undefined ? { error: outcome.error } : {}),
      reachedProofCheck: outcome.reachedProofCheck,
    };
  }
}
