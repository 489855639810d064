import { ParseError } from './errors';

/**
 * Removes a leading ```json or ``` fence and a trailing ``` fence,
 * then trims the result. Text without fences is only trimmed.
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice('```json'.length);
  }
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Parses a model response that should hold a single JSON value,
 * optionally wrapped in a Markdown code fence.
 *
 * @param context - Used in error messages (e.g. 'plan', 'verify')
 * @throws ParseError when the text is not valid JSON
 */
export function parseJsonResponse(text: string, context?: string): unknown {
  const cleaned = stripCodeFences(text);
  if (!cleaned) {
    const contextStr = context ? ` in ${context} response` : '';
    throw new ParseError(`No JSON found${contextStr}.`);
  }

  try {
    return JSON.parse(cleaned) as unknown;
  } catch (e) {
    const contextStr = context ? ` from ${context} response` : '';
    throw new ParseError(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }
}
