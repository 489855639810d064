export { AttemptOrchestrator, type AttemptOrchestratorOptions } from './orchestrator';
export { createContext, errorSignature, recordAttempt, type AccumulationContext } from './context';
export { scoreAttempt, selectBestEffort } from './best-effort';
