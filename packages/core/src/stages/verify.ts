import { z } from 'zod';
import { errorMessage } from '@leansmith/shared';
import { parseStructured, reportStage, requestCompletion, type StageOptions } from './common';
import { buildVerifyMessages } from './prompts';
import type { Stage, StageResult, VerifyInput } from './types';

/** Models send `null` or blank strings for "no correction". */
const correction = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value : undefined));

export const ReviewSchema = z.object({
  error_analysis: z.string(),
  suggested_fixes: z.array(z.string()),
  corrected_code: correction,
  corrected_proof: correction,
  confidence: z.number().min(0).max(1).default(0.5),
});

export type Review = z.infer<typeof ReviewSchema> & {
  /** `passed` when there was no error to analyse */
  status: 'passed' | 'analyzed';
};

export class VerifyStage implements Stage<VerifyInput, Review> {
  readonly name = 'verify';

  constructor(private readonly options: StageOptions) {}

  async process(input: VerifyInput): Promise<StageResult<Review>> {
    if (!input.error.trim()) {
      return reportStage<Review>(this.options.ctx, this.name, {
        kind: 'parsed',
        value: {
          status: 'passed',
          error_analysis: 'No errors detected',
          suggested_fixes: [],
          corrected_code: undefined,
          corrected_proof: undefined,
          confidence: 1,
        },
        raw: '',
      });
    }

    let raw: string;
    try {
      raw = await requestCompletion(this.options, buildVerifyMessages(input));
    } catch (error) {
      return reportStage<Review>(this.options.ctx, this.name, {
        kind: 'failed',
        error: `Verification failed: ${errorMessage(error)}`,
      });
    }

    const parsed = parseStructured(raw, ReviewSchema, 'verification');
    if (parsed.success) {
      return reportStage<Review>(this.options.ctx, this.name, {
        kind: 'parsed',
        value: { ...parsed.value, status: 'analyzed' },
        raw,
      });
    }
    return reportStage<Review>(this.options.ctx, this.name, {
      kind: 'fallback',
      value: {
        status: 'analyzed',
        error_analysis: raw,
        suggested_fixes: ['See error analysis'],
        corrected_code: undefined,
        corrected_proof: undefined,
        confidence: 0.5,
      },
      raw,
      reason: parsed.reason,
    });
  }
}
