import type { z } from 'zod';
import type { AdapterContext, ProviderAdapter } from '@leansmith/adapters';
import { errorMessage, eventMeta, parseJsonResponse, type ChatMessage } from '@leansmith/shared';
import type { StageName, StageResult } from './types';

export interface StageOptions {
  provider: ProviderAdapter;
  ctx: AdapterContext;
  temperature: number;
  maxTokens: number;
}

/** One provider call; retries happen inside the adapter transport. */
export async function requestCompletion(options: StageOptions, messages: ChatMessage[]): Promise<string> {
  const response = await options.provider.generate(
    {
      messages,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      jsonMode: options.provider.capabilities().supportsJsonMode,
    },
    options.ctx,
  );
  return response.text ?? '';
}

export type StructuredParse<T> = { success: true; value: T } | { success: false; reason: string };

/**
 * Strips code fences, parses JSON and validates it against `schema`.
 */
export function parseStructured<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: string,
): StructuredParse<T> {
  let json: unknown;
  try {
    json = parseJsonResponse(raw, context);
  } catch (error) {
    return { success: false, reason: errorMessage(error) };
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    return { success: false, reason: `Response did not match the ${context} schema: ${issues}` };
  }
  return { success: true, value: result.data };
}

export async function reportStage<O>(
  ctx: AdapterContext,
  stage: StageName,
  result: StageResult<O>,
): Promise<StageResult<O>> {
  const reason =
    result.kind === 'fallback' ? result.reason : result.kind === 'failed' ? result.error : undefined;
  await ctx.logger.log({
    ...eventMeta(ctx.runId),
    type: 'StageCompleted',
    payload: { stage, outcome: result.kind, ...(reason !== undefined ? { reason } : {}) },
  });
  return result;
}
