export * from './types';
export { parseStructured, requestCompletion, type StageOptions, type StructuredParse } from './common';
export { buildPlanMessages, buildGenerateMessages, buildVerifyMessages, renderAttempts } from './prompts';
export { PlanStage, PlanSchema, type Plan } from './plan';
export { GenerateStage, GeneratedSchema, type Generated } from './generate';
export { VerifyStage, ReviewSchema, type Review } from './verify';
export {
  FALLBACK_PATTERNS,
  DEFAULT_FALLBACK,
  matchFallbackPattern,
  type FallbackPattern,
} from './fallback-patterns';
