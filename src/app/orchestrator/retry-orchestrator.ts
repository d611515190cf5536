import type {
  Attempt,
  Candidate,
  ExecuteOptions,
  ExecutionOutcome,
  IAttemptSink,
  ICommandExecutor,
  IProviderClient,
  LoopResult,
  Outcome,
} from '../../domain/loop/types.js';
import { DEFAULT_MAX_RETRIES } from '../../domain/loop/types.js';
import { requiresConfirmation, type IRiskClassifier, type RiskTier } from '../../domain/risk/types.js';
import type { ConfirmationDecision, IConfirmationGate } from '../../domain/confirmation/types.js';
import { ProviderError } from '../../infra/llm/llm-provider.js';
import { ConfigValidationError } from '../../infra/config/runtime-config.js';
import { silentLogger, type Logger } from '../../infra/logging/logger.js';
import { isAbortError, withAbortSignal } from '../execution/abort-signals.js';
import {
  DEFAULT_FAILURE_CONTEXT_LIMITS,
  FailureContext,
  buildPrompt,
  summarizeExecutionFailure,
  summarizeProviderError,
  type FailureContextLimits,
} from './failure-context.js';

/**
 * Progress callbacks for the terminal; none of them may throw.
 */
export interface OrchestratorEvents {
  onProposing?(attemptNumber: number): void;
  onCandidate?(attemptNumber: number, candidate: Candidate, tier: RiskTier): void;
  onAttempt?(attempt: Attempt): void;
}

export interface RetryOrchestratorDeps {
  provider: IProviderClient;
  classifier: IRiskClassifier;
  gate: IConfirmationGate;
  executor: ICommandExecutor;
  attemptSink?: IAttemptSink;
  logger?: Logger;
  failureContext?: Partial<FailureContextLimits>;
  /** Forwarded to every execute() call */
  execution?: Omit<ExecuteOptions, 'signal'>;
  events?: OrchestratorEvents;
}

const INTERRUPTED = 'interrupted';

class Interrupted extends Error {}

/**
 * Retry Orchestrator
 *
 * Drives propose → classify → confirm → execute until a command succeeds,
 * the user declines, a fatal error occurs or the retry budget runs out.
 * Failures are summarized into the next prompt.
 */
export class RetryOrchestrator {
  private readonly logger: Logger;
  private readonly limits: FailureContextLimits;
  private readonly events: OrchestratorEvents;

  constructor(private readonly deps: RetryOrchestratorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.limits = { ...DEFAULT_FAILURE_CONTEXT_LIMITS, ...deps.failureContext };
    this.events = deps.events ?? {};
  }

  async run(request: string, maxRetries: number = DEFAULT_MAX_RETRIES, signal?: AbortSignal): Promise<LoopResult> {
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigValidationError(`maxRetries must be a non-negative integer, got ${maxRetries}`, [
        { path: '/maxRetries', message: 'must be a non-negative integer' },
      ]);
    }

    const attempts: Attempt[] = [];
    const trimmed = request.trim();
    if (!trimmed) {
      return { status: 'aborted', reason: 'empty request', interrupted: false, attempts };
    }

    const context = new FailureContext(this.limits);
    this.logger.info('[Orchestrator] Run started', { request: trimmed, maxRetries });

    try {
      for (let attemptNumber = 1; attemptNumber <= maxRetries + 1; attemptNumber++) {
        if (signal?.aborted) throw new Interrupted();

        const prompt = buildPrompt(trimmed, context);
        const startedAt = Date.now();
        const finish = (outcome: Outcome, candidate?: Candidate, tier?: RiskTier): Attempt => {
          const attempt: Attempt = { number: attemptNumber, prompt, candidate, tier, outcome, startedAt, finishedAt: Date.now() };
          this.record(trimmed, attempts, attempt);
          return attempt;
        };

        // 1. Propose
        this.events.onProposing?.(attemptNumber);
        let candidate: Candidate;
        try {
          candidate = await this.guard(this.deps.provider.propose(prompt, { signal }), signal);
        } catch (error) {
          if (error instanceof Interrupted) throw error;
          const reason = error instanceof Error ? error.message : String(error);
          const recoverable = error instanceof ProviderError && error.recoverable;
          finish({ type: 'provider_error', reason, recoverable });

          if (!recoverable) {
            this.logger.error('[Orchestrator] Fatal provider error', { attempt: attemptNumber, reason });
            return { status: 'aborted', reason, interrupted: false, attempts };
          }
          this.logger.warn('[Orchestrator] Provider error, retrying', { attempt: attemptNumber, reason });
          context.add(summarizeProviderError(attemptNumber, reason, this.limits));
          continue;
        }

        // 2. Classify
        const tier = this.deps.classifier.classify(candidate);
        this.logger.info('[Orchestrator] Candidate', { attempt: attemptNumber, command: candidate.command, tier });
        this.events.onCandidate?.(attemptNumber, candidate, tier);

        // 3. Confirm
        if (requiresConfirmation(tier)) {
          const decision: ConfirmationDecision = await this.guard(
            this.deps.gate.confirm(candidate, tier, { signal }),
            signal
          );
          if (decision === 'declined') {
            finish({ type: 'declined' }, candidate, tier);
            this.logger.info('[Orchestrator] Declined', { attempt: attemptNumber });
            return { status: 'completed', outcome: { type: 'declined' }, attempts };
          }
        }

        // 4. Execute
        // not raced: the executor settles only after the child is reaped
        const outcome: ExecutionOutcome = await this.guard(
          this.deps.executor.execute(candidate, { ...this.deps.execution, signal }),
          signal,
          false
        );
        finish(outcome, candidate, tier);

        if (outcome.type === 'success') {
          this.logger.info('[Orchestrator] Succeeded', { attempt: attemptNumber, durationMs: outcome.durationMs });
          return { status: 'completed', outcome, attempts };
        }

        this.logger.warn('[Orchestrator] Command failed', {
          attempt: attemptNumber,
          exitCode: outcome.exitCode,
          timedOut: outcome.timedOut,
        });
        context.add(summarizeExecutionFailure(attemptNumber, candidate.command, outcome, this.limits));
      }
    } catch (error) {
      if (error instanceof Interrupted) {
        this.logger.warn('[Orchestrator] Interrupted', { attempts: attempts.length });
        return { status: 'aborted', reason: INTERRUPTED, interrupted: true, attempts };
      }
      throw error;
    }

    this.logger.warn('[Orchestrator] Retries exhausted', { attempts: attempts.length });
    return { status: 'retries_exhausted', attempts };
  }

  /**
   * Await `promise`, turning any abort (signal or AbortError) into Interrupted.
   * With `race`, an abort settles immediately instead of waiting for the promise.
   */
  private async guard<T>(promise: Promise<T>, signal: AbortSignal | undefined, race: boolean = true): Promise<T> {
    try {
      return await (race ? withAbortSignal(promise, signal) : promise);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw new Interrupted();
      }
      throw error;
    }
  }

  private record(request: string, attempts: Attempt[], attempt: Attempt): void {
    attempts.push(attempt);
    try {
      this.deps.attemptSink?.record(request, attempt);
    } catch (error) {
      this.logger.warn('[Orchestrator] Attempt sink failed', { error });
    }
    this.events.onAttempt?.(attempt);
  }
}
