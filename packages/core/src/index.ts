export const name = '@leansmith/core';

export * from './stages';
export * from './verification';
export * from './orchestrator';
export { NO_CONTEXT, type ContextSource } from './retrieval';
export { ProviderRegistry, type AdapterFactory } from './registry';
export { ConfigLoader, USER_CONFIG_DIR, REPO_CONFIG_FILE, type ConfigOptions } from './config/loader';
export {
  createLogger,
  createProver,
  createVectorIndex,
  mainWorkflow,
  type Prover,
  type ProverOptions,
  type WorkflowOptions,
} from './workflow';
