import { z } from 'zod';
import { errorMessage } from '@leansmith/shared';
import { parseStructured, reportStage, requestCompletion, type StageOptions } from './common';
import { buildPlanMessages } from './prompts';
import type { PlanInput, Stage, StageResult } from './types';

export const PlanSchema = z.object({
  strategy: z.string(),
  implementation_steps: z.array(z.string()),
  proof_approach: z.string(),
  lean_concepts: z.array(z.string()).optional(),
  potential_challenges: z.array(z.string()).optional(),
});

type ParsedPlan = z.infer<typeof PlanSchema>;

/** A parsed plan, or only `strategy` when the raw text was kept as-is. */
export type Plan = Pick<ParsedPlan, 'strategy'> & Partial<ParsedPlan>;

export class PlanStage implements Stage<PlanInput, Plan> {
  readonly name = 'plan';

  constructor(private readonly options: StageOptions) {}

  async process(input: PlanInput): Promise<StageResult<Plan>> {
    let raw: string;
    try {
      raw = await requestCompletion(this.options, buildPlanMessages(input));
    } catch (error) {
      return reportStage<Plan>(this.options.ctx, this.name, {
        kind: 'failed',
        error: `Planning failed: ${errorMessage(error)}`,
      });
    }

    const parsed = parseStructured(raw, PlanSchema, 'plan');
    if (parsed.success) {
      return reportStage<Plan>(this.options.ctx, this.name, { kind: 'parsed', value: parsed.value, raw });
    }
    return reportStage<Plan>(this.options.ctx, this.name, {
      kind: 'fallback',
      value: { strategy: raw },
      raw,
      reason: parsed.reason,
    });
  }
}
