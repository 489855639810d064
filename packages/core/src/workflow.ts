import path from 'path';
import fs from 'fs-extra';
import { createEmbedder, type AdapterContext, type Embedder } from '@leansmith/adapters';
import { LakeCompiler, ProofCompiler, type SourceCompiler } from '@leansmith/exec';
import { VectorIndex } from '@leansmith/retrieval';
import {
  ConsoleLogger,
  JsonlLogger,
  PLACEHOLDER_SOLUTION,
  errorMessage,
  logger as defaultLogger,
  type Config,
  type Logger,
  type ProviderRole,
  type Solution,
} from '@leansmith/shared';
import { ConfigLoader, type ConfigOptions } from './config/loader';
import { AttemptOrchestrator } from './orchestrator';
import { ProviderRegistry, type AdapterFactory } from './registry';
import { GenerateStage, PlanStage, VerifyStage } from './stages';
import { VerificationLoop } from './verification';

export interface ProverOptions {
  logger?: Logger;
  runId?: string;
  /** Directory relative paths in the config are resolved against */
  baseDir?: string;
  adapterFactory?: AdapterFactory;
  embedder?: Embedder;
  /** Replaces the Lake compiler, e.g. with an in-process stand-in */
  compiler?: SourceCompiler;
}

/** Everything one run needs, wired from configuration. */
export interface Prover {
  config: Config;
  logger: Logger;
  runId: string;
  registry: ProviderRegistry;
  index: VectorIndex;
  compiler: ProofCompiler;
  orchestrator: AttemptOrchestrator;
}

/**
 * JSONL events when `logging.eventsPath` is set (resolved against `baseDir`,
 * parent directory created), console otherwise. Both honour `logging.level`.
 */
export function createLogger(config: Config, baseDir = process.cwd()): Logger {
  const { eventsPath, level } = config.logging;
  if (!eventsPath) {
    return new ConsoleLogger(level);
  }
  const filePath = path.resolve(baseDir, eventsPath);
  fs.ensureDirSync(path.dirname(filePath));
  return new JsonlLogger(filePath, level);
}

export function createVectorIndex(
  config: Config,
  options: Pick<ProverOptions, 'baseDir' | 'embedder' | 'runId'> & { logger: Logger },
): VectorIndex {
  const baseDir = options.baseDir ?? process.cwd();
  const { retrieval } = config;
  const keySource = config.providers[config.defaults.planner];
  const embedder =
    options.embedder ??
    createEmbedder(retrieval.embeddings, { apiKey: keySource?.api_key, apiKeyEnv: keySource?.api_key_env });

  return new VectorIndex({
    embedder,
    logger: options.logger,
    documentsDir: path.resolve(baseDir, retrieval.documentsDir),
    indexDir: path.resolve(baseDir, retrieval.indexDir),
    chunkSize: retrieval.chunkSize,
    overlapSize: retrieval.overlapSize,
    maxChunks: retrieval.maxChunks,
    batchSize: retrieval.embeddings.batchSize,
    runId: options.runId,
  });
}

export function createProver(config: Config, options: ProverOptions = {}): Prover {
  const baseDir = options.baseDir ?? process.cwd();
  const logger = options.logger ?? createLogger(config, baseDir);
  const runId = options.runId ?? Date.now().toString();
  const { workflow } = config;

  const registry = new ProviderRegistry(config, options.adapterFactory);
  const contextFor = (role: ProviderRole): AdapterContext => ({
    runId,
    logger,
    retryOptions: config.retry,
    timeoutMs: config.providers[config.defaults[role]]?.timeoutMs,
  });
  const stageOptions = (role: ProviderRole, temperature: number) => ({
    provider: registry.forRole(role),
    ctx: contextFor(role),
    temperature,
    maxTokens: workflow.maxTokens,
  });

  const index = createVectorIndex(config, { ...options, logger, runId, baseDir });
  const compiler = new ProofCompiler(
    options.compiler ??
      new LakeCompiler({ ...config.compiler, cwd: path.resolve(baseDir, config.compiler.cwd), logger, runId }),
  );

  const verificationLoop = new VerificationLoop({
    compiler,
    verifyStage: new VerifyStage(stageOptions('verifier', workflow.temperatures.verify)),
    retrieval: index,
    logger,
    runId,
    maxRounds: workflow.maxVerificationRounds,
    contextChunks: workflow.contextChunks.verify,
  });

  const orchestrator = new AttemptOrchestrator({
    planStage: new PlanStage(stageOptions('planner', workflow.temperatures.plan)),
    generateStage: new GenerateStage(stageOptions('generator', workflow.temperatures.generate)),
    verificationLoop,
    retrieval: index,
    logger,
    runId,
    maxAttempts: workflow.maxAttempts,
    maxVerificationRounds: workflow.maxVerificationRounds,
    contextChunks: { plan: workflow.contextChunks.plan, generate: workflow.contextChunks.generate },
  });

  return { config, logger, runId, registry, index, compiler, orchestrator };
}

export interface WorkflowOptions extends ProverOptions {
  /** Used as-is instead of loading configuration */
  config?: Config;
  configOptions?: ConfigOptions;
}

/**
 * Solves one task end to end. Never throws: a failure to load configuration
 * or to wire any collaborator is logged and answered with the placeholder pair.
 */
export async function mainWorkflow(
  description: string,
  template: string,
  options: WorkflowOptions = {},
): Promise<Solution> {
  const fallbackLogger = options.logger ?? defaultLogger;
  try {
    const config = options.config ?? ConfigLoader.load(options.configOptions);
    const prover = createProver(config, options);
    return await prover.orchestrator.solve({ description, template });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(errorMessage(error));
    await fallbackLogger.error(cause, `Workflow failed, returning the placeholder solution: ${cause.message}`);
    return { ...PLACEHOLDER_SOLUTION };
  }
}
