export {
  VerificationLoop,
  compilerDiagnostics,
  type VerificationLoopOptions,
  type VerificationOutcome,
} from './loop';
