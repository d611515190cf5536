export { RetryOrchestrator, type RetryOrchestratorDeps, type OrchestratorEvents } from './retry-orchestrator.js';
export {
  FailureContext,
  buildPrompt,
  summarizeExecutionFailure,
  summarizeProviderError,
  truncateBytes,
  DEFAULT_FAILURE_CONTEXT_LIMITS,
  type FailureContextLimits,
} from './failure-context.js';
