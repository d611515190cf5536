/**
 * Command Loop Domain Types
 *
 * A run turns one natural-language request into a sequence of attempts.
 * Each attempt asks the provider for a candidate command, classifies it,
 * optionally asks the user, executes it and records the outcome.
 */

import type { RiskTier } from '../risk/types.js';

// ============================================================================
// Candidate
// ============================================================================

export interface Candidate {
  /** Shell command to run, never empty */
  command: string;
  /** Short explanation from the model */
  rationale?: string;
  /** The model flagged the command as destructive */
  dangerous?: boolean;
}

// ============================================================================
// Outcomes
// ============================================================================

export interface SuccessOutcome {
  type: 'success';
  stdout: string;
  stderr: string;
  exitCode: 0;
  durationMs: number;
}

export interface FailureOutcome {
  type: 'failure';
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** Set when the failure was not a plain nonzero exit (timeout, spawn error) */
  reason?: string;
  durationMs: number;
}

export interface DeclinedOutcome {
  type: 'declined';
}

export interface ProviderErrorOutcome {
  type: 'provider_error';
  reason: string;
  recoverable: boolean;
}

export type ExecutionOutcome = SuccessOutcome | FailureOutcome;

export type Outcome =
  | SuccessOutcome
  | FailureOutcome
  | DeclinedOutcome
  | ProviderErrorOutcome;

// ============================================================================
// Attempts
// ============================================================================

export interface Attempt {
  /** 1-based sequence number */
  number: number;
  prompt: string;
  candidate?: Candidate;
  tier?: RiskTier;
  outcome: Outcome;
  startedAt: number;
  finishedAt: number;
}

// ============================================================================
// Loop Result
// ============================================================================

export interface CompletedResult {
  status: 'completed';
  outcome: SuccessOutcome | DeclinedOutcome;
  attempts: Attempt[];
}

export interface RetriesExhaustedResult {
  status: 'retries_exhausted';
  attempts: Attempt[];
}

export interface AbortedResult {
  status: 'aborted';
  reason: string;
  /** True when the run stopped because the user interrupted it */
  interrupted: boolean;
  attempts: Attempt[];
}

export type LoopResult = CompletedResult | RetriesExhaustedResult | AbortedResult;

export const DEFAULT_MAX_RETRIES = 3;

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  success: 0,
  aborted: 1,
  declined: 2,
  retriesExhausted: 3,
  usage: 64,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForResult(result: LoopResult): ExitCode {
  switch (result.status) {
    case 'completed':
      return result.outcome.type === 'success' ? EXIT_CODES.success : EXIT_CODES.declined;
    case 'retries_exhausted':
      return EXIT_CODES.retriesExhausted;
    case 'aborted':
      return result.interrupted ? EXIT_CODES.interrupted : EXIT_CODES.aborted;
  }
}

// ============================================================================
// Collaborators
// ============================================================================

export interface ProposeOptions {
  signal?: AbortSignal;
}

/**
 * Turns a prompt into one candidate command.
 * Rejects with ProviderError; `recoverable` decides whether the loop retries.
 */
export interface IProviderClient {
  propose(prompt: string, options?: ProposeOptions): Promise<Candidate>;
}

export type OutputStream = 'stdout' | 'stderr';

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Overrides the executor's default timeout */
  timeoutMs?: number;
  /** Live copy of the child's output */
  onOutput?: (chunk: string, stream: OutputStream) => void;
}

export interface ICommandExecutor {
  /**
   * Resolves once the child has exited and been reaped.
   * Rejects with AbortError when the signal fires.
   */
  execute(candidate: Candidate, options?: ExecuteOptions): Promise<ExecutionOutcome>;
}

/**
 * Receives every finished attempt. Must not throw.
 */
export interface IAttemptSink {
  record(request: string, attempt: Attempt): void;
}
