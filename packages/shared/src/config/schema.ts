import { z } from 'zod';

export const ProviderConfigSchema = z
  .object({
    type: z.enum(['openai', 'fake']),
    model: z.string().min(1),
    api_key_env: z.string().optional(),
    api_key: z.string().optional(),
    baseURL: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
    /** Scripted replies for the `fake` provider, consumed in order */
    responses: z.array(z.string()).optional(),
  })
  .strict();

const DEFAULT_PROVIDERS = {
  planner: { type: 'openai', model: 'gpt-4o' },
  verifier: { type: 'openai', model: 'gpt-3.5-turbo' },
} satisfies Record<string, z.input<typeof ProviderConfigSchema>>;

export const RetryConfigSchema = z.object({
  /** Total calls per request, first try included */
  maxAttempts: z.number().int().min(1).default(3),
  initialDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(30_000),
});

export const WorkflowConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(5),
  maxVerificationRounds: z.number().int().min(1).default(3),
  maxTokens: z.number().int().positive().default(2000),
  temperatures: z
    .object({
      plan: z.number().min(0).max(2).default(0.3),
      generate: z.number().min(0).max(2).default(0.1),
      verify: z.number().min(0).max(2).default(0.2),
    })
    .default({}),
  /** Chunks of retrieval context requested per stage */
  contextChunks: z
    .object({
      plan: z.number().int().min(0).default(3),
      generate: z.number().int().min(0).default(5),
      verify: z.number().int().min(0).default(3),
    })
    .default({}),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['openai', 'local-hash']).default('openai'),
  model: z.string().default('text-embedding-3-small'),
  /** Required for local-hash; inferred from the model for openai */
  dims: z.number().int().positive().optional(),
  batchSize: z.number().int().positive().default(100),
});

export const RetrievalConfigSchema = z
  .object({
    documentsDir: z.string().default('documents'),
    indexDir: z.string().default('.leansmith/index'),
    chunkSize: z.number().int().positive().default(1000),
    overlapSize: z.number().int().min(0).default(200),
    /** Default `k` for searches that do not name one */
    maxChunks: z.number().int().positive().default(10),
    embeddings: EmbeddingsConfigSchema.default({}),
  })
  .refine((data) => data.overlapSize < data.chunkSize, {
    message: 'overlapSize must be smaller than chunkSize',
    path: ['overlapSize'],
  });

export const CompilerConfigSchema = z.object({
  command: z.string().default('lake'),
  args: z.array(z.string()).default(['lean']),
  /** Directory the compiler runs in (the Lake project root) */
  cwd: z.string().default('.'),
  /** Where temporary source files are written, relative to cwd */
  workDir: z.string().default('lean_playground'),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Structured events are appended here when set */
  eventsPath: z.string().optional(),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  providers: z.record(z.string(), ProviderConfigSchema).default(DEFAULT_PROVIDERS),
  defaults: z
    .object({
      planner: z.string().default('planner'),
      generator: z.string().default('planner'),
      verifier: z.string().default('verifier'),
    })
    .default({}),
  retry: RetryConfigSchema.default({}),
  workflow: WorkflowConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  compiler: CompilerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type CompilerConfig = z.infer<typeof CompilerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ProviderRole = keyof Config['defaults'];
