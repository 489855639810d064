import { PLACEHOLDER_PROOF } from '@leansmith/shared';

export const CODE_SLOT = '{{code}}';
export const PROOF_SLOT = '{{proof}}';

export const IMPLEMENTATION_FILE = 'ImplementationTest.lean';
export const FULL_SOLUTION_FILE = 'FullSolutionTest.lean';
export const SYNTAX_FILE = 'SyntaxTest.lean';

/**
 * Substitutes every occurrence of both slots. The code slot is filled
 * first. Replacements are literal: `$` sequences in Lean source are kept.
 */
export function fillTemplate(template: string, code: string, proof: string): string {
  return template.replaceAll(CODE_SLOT, () => code).replaceAll(PROOF_SLOT, () => proof);
}

/** Source that checks only the implementation: the proof is left unproved. */
export function implementationSource(template: string, code: string): string {
  return fillTemplate(template, code, PLACEHOLDER_PROOF);
}

/** Wraps a bare snippet with the imports a task file normally has. */
export function syntaxCheckSource(code: string): string {
  return `import Mathlib\nimport Aesop\n\n${code}\n`;
}

export function hasSlots(template: string): boolean {
  return template.includes(CODE_SLOT) && template.includes(PROOF_SLOT);
}
