const REDACTION_PLACEHOLDER = '[REDACTED]';

const secretValuePatterns: RegExp[] = [
  /sk-(?:proj-)?[a-zA-Z0-9_-]{20,}/g, // OpenAI style
  /Bearer\s+[a-zA-Z0-9._-]{16,}/g,
  /(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g,
];

/** Object keys whose values are never written to logs. */
const secretKeyPattern = /^(?:api[_-]?key|apiKey|secret|token|password|authorization)$/i;

export interface RedactionResult<T> {
  redacted: T;
  redactionCount: number;
}

export function redactString(input: string): RedactionResult<string> {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of secretValuePatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): RedactionResult<unknown> {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let total = 0;
    const redacted = input.map((item: unknown) => {
      const result = redactUnknown(item);
      total += result.redactionCount;
      return result.redacted;
    });
    return { redacted, redactionCount: total };
  }

  if (typeof input === 'object' && input !== null) {
    let total = 0;
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (secretKeyPattern.test(key) && value !== undefined && value !== '') {
        redacted[key] = REDACTION_PLACEHOLDER;
        total += 1;
        continue;
      }
      const result = redactUnknown(value);
      total += result.redactionCount;
      redacted[key] = result.redacted;
    }
    return { redacted, redactionCount: total };
  }

  return { redacted: input, redactionCount: 0 };
}

/**
 * Redacted copy of a value that is about to be persisted to a log.
 */
export function redactForLogs(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
