import { z } from 'zod';
import { errorMessage } from '@leansmith/shared';
import { parseStructured, reportStage, requestCompletion, type StageOptions } from './common';
import { matchFallbackPattern } from './fallback-patterns';
import { buildGenerateMessages } from './prompts';
import type { GenerateInput, Stage, StageResult } from './types';

const nonBlank = z.string().regex(/\S/, 'must not be blank');

export const GeneratedSchema = z.object({
  code: nonBlank,
  proof: nonBlank,
  explanation: z.string().optional(),
});

export type Generated = z.infer<typeof GeneratedSchema>;

/**
 * Produces the code/proof pair. A response that does not parse is replaced
 * by the canned pattern matching the task description, so the result never
 * has an empty implementation.
 */
export class GenerateStage implements Stage<GenerateInput, Generated> {
  readonly name = 'generate';

  constructor(private readonly options: StageOptions) {}

  async process(input: GenerateInput): Promise<StageResult<Generated>> {
    let raw: string;
    try {
      raw = await requestCompletion(this.options, buildGenerateMessages(input));
    } catch (error) {
      return reportStage<Generated>(this.options.ctx, this.name, {
        kind: 'failed',
        error: `Generation failed: ${errorMessage(error)}`,
      });
    }

    const parsed = parseStructured(raw, GeneratedSchema, 'generation');
    if (parsed.success) {
      return reportStage<Generated>(this.options.ctx, this.name, { kind: 'parsed', value: parsed.value, raw });
    }

    const pattern = matchFallbackPattern(input.task.description);
    return reportStage<Generated>(this.options.ctx, this.name, {
      kind: 'fallback',
      value: { code: pattern.code, proof: pattern.proof, explanation: pattern.explanation },
      raw,
      reason: parsed.reason,
    });
  }
}
