import type { AttemptRecord, ChatMessage } from '@leansmith/shared';
import type { GenerateInput, PlanInput, VerifyInput } from './types';

const PLAN_SYSTEM_PROMPT = `You are a Lean 4 theorem proving expert and planning agent.
Your job is to analyze programming tasks and create detailed implementation plans.

You should:
1. Break down the problem into logical steps
2. Identify key Lean 4 concepts and tactics needed
3. Suggest an implementation approach
4. Anticipate potential proof challenges
5. Recommend relevant Lean 4 libraries or theorems

Return your response as JSON with these fields:
- strategy: High-level approach
- implementation_steps: List of specific coding steps
- proof_approach: Strategy for proving correctness
- lean_concepts: Relevant Lean 4 concepts to use
- potential_challenges: Anticipated difficulties`;

const GENERATE_SYSTEM_PROMPT = `You are an expert Lean 4 programmer. Your job is to generate working Lean 4 code and formal proofs.

Requirements:
1. Generate ONLY the implementation that replaces {{code}}: no comments, no placeholders
2. Generate ONLY the proof tactics that replace {{proof}}: no 'sorry', no placeholders
3. For simple equalities use 'rfl' or 'simp'
4. For arithmetic and conditionals use 'omega', or 'simp [function_name]; split <;> omega'

Return JSON with:
- code: the implementation
- proof: the proof tactics
- explanation: a brief explanation`;

const VERIFY_SYSTEM_PROMPT = `You are a Lean 4 debugging expert. Analyze compilation errors and suggest fixes.

Your tasks:
1. Identify the root cause of the errors
2. Suggest specific corrections
3. Provide corrected code and/or proof where possible

Return JSON with:
- error_analysis: Description of the problem
- suggested_fixes: List of specific corrections
- corrected_code: Fixed implementation (if applicable)
- corrected_proof: Fixed proof (if applicable)
- confidence: Your confidence in the fix, from 0 to 1`;

function contextSection(title: string, context: string): string[] {
  return context.trim() ? ['', `${title}:`, context] : [];
}

export function renderAttempts(attempts: readonly AttemptRecord[]): string[] {
  return attempts.map((a) => `Attempt ${a.index}: ${a.error ?? 'Unknown error'}`);
}

export function buildPlanMessages(input: PlanInput): ChatMessage[] {
  const lines = [
    `Task Description: ${input.task.description}`,
    '',
    `Task Template:\n${input.task.template}`,
    ...contextSection('Relevant Lean 4 documentation and examples', input.context),
  ];

  if (input.previousAttempts.length > 0) {
    lines.push(
      '',
      'Previous attempts:',
      ...input.previousAttempts.map(
        (a) => `Attempt ${a.index} (${a.stage}): ${a.error ?? 'Unknown error'}`,
      ),
    );
  }
  if (input.errorSignatures.length > 0) {
    lines.push('', 'Errors seen so far:', ...input.errorSignatures.map((s) => `- ${s}`));
  }

  lines.push('', 'Please create a detailed implementation plan for this Lean 4 theorem proving task.');
  return [
    { role: 'system', content: PLAN_SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') },
  ];
}

export function buildGenerateMessages(input: GenerateInput): ChatMessage[] {
  const lines = [
    `Task: ${input.task.description}`,
    '',
    `Template:\n${input.task.template}`,
    '',
    `Plan:\n${input.plan}`,
    ...contextSection('Relevant Lean 4 documentation and examples', input.context),
  ];

  if (input.previousAttempts.length > 0) {
    lines.push('', 'Previous attempts (avoid these errors):', ...renderAttempts(input.previousAttempts));
  }

  lines.push('', `This is attempt ${input.attemptNumber}. Return JSON with code and proof.`);
  return [
    { role: 'system', content: GENERATE_SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') },
  ];
}

export function buildVerifyMessages(input: VerifyInput): ChatMessage[] {
  const lines = [
    `Code: ${input.code}`,
    '',
    `Proof: ${input.proof}`,
    '',
    `Error Type: ${input.errorType}`,
    '',
    `Error Output:\n${input.error}`,
    ...contextSection('Relevant documentation', input.context),
    '',
    'Please analyze these errors and suggest fixes.',
  ];
  return [
    { role: 'system', content: VERIFY_SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') },
  ];
}
