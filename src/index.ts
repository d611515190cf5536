export * from './app/orchestrator/index.js';
export * from './app/provider/index.js';
export { PolicyConfirmationGate, createApproveAllGate, createDeclineAllGate } from './app/confirmation/policy-gate.js';
export { AbortError, isAbortError } from './app/execution/abort-signals.js';

export * from './infra/risk/index.js';
export * from './infra/llm/index.js';
export { ShellCommandExecutor, type ShellExecutorConfig } from './infra/shell/command-executor.js';
export { getHostInfo, type HostInfo } from './infra/shell/system-info.js';
export { JsonlAttemptLog } from './infra/audit/attempt-log.js';
export { HistoryStore } from './infra/persistence/history-store.js';
export { loadSettings, ConfigValidationError, type CmdwiseSettings, type SettingsOverrides } from './infra/config/index.js';
export { createFileLogger, silentLogger, type Logger } from './infra/logging/logger.js';

export type * from './domain/loop/types.js';
export type * from './domain/risk/types.js';
export type * from './domain/confirmation/types.js';
export { EXIT_CODES, exitCodeForResult, DEFAULT_MAX_RETRIES } from './domain/loop/types.js';
export { RISK_TIER_ORDER, compareRiskTiers, maxRiskTier, requiresConfirmation } from './domain/risk/types.js';
