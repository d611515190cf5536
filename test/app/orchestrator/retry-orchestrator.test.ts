import { RetryOrchestrator, type RetryOrchestratorDeps } from '../../../src/app/orchestrator/retry-orchestrator.js';
import { AbortError } from '../../../src/app/execution/abort-signals.js';
import { createRiskClassifier } from '../../../src/infra/risk/risk-classifier.js';
import { ProviderError } from '../../../src/infra/llm/llm-provider.js';
import { ConfigValidationError } from '../../../src/infra/config/runtime-config.js';
import type {
  Attempt,
  Candidate,
  ExecuteOptions,
  ExecutionOutcome,
  IAttemptSink,
  ICommandExecutor,
  IProviderClient,
  ProposeOptions,
} from '../../../src/domain/loop/types.js';
import type { RiskTier } from '../../../src/domain/risk/types.js';
import type { ConfirmationDecision, ConfirmOptions, IConfirmationGate } from '../../../src/domain/confirmation/types.js';

// ============================================================================
// Fakes
// ============================================================================

type Step = Candidate | Error | ((options: ProposeOptions) => Promise<Candidate>);

class ScriptedProvider implements IProviderClient {
  prompts: string[] = [];

  constructor(private readonly script: Step[], private readonly fallback?: Step) {}

  async propose(prompt: string, options: ProposeOptions = {}): Promise<Candidate> {
    this.prompts.push(prompt);
    const step = this.script.shift() ?? this.fallback;
    if (!step) throw new Error('provider script exhausted');
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(options);
    return step;
  }
}

class RecordingGate implements IConfirmationGate {
  calls: Array<{ command: string; tier: RiskTier }> = [];

  constructor(private readonly decision: ConfirmationDecision) {}

  async confirm(candidate: Candidate, tier: RiskTier): Promise<ConfirmationDecision> {
    this.calls.push({ command: candidate.command, tier });
    return this.decision;
  }
}

class ScriptedExecutor implements ICommandExecutor {
  commands: string[] = [];

  constructor(private readonly run: (command: string, options: ExecuteOptions) => Promise<ExecutionOutcome>) {}

  execute(candidate: Candidate, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    this.commands.push(candidate.command);
    return this.run(candidate.command, options);
  }
}

class MemorySink implements IAttemptSink {
  entries: Array<{ request: string; attempt: Attempt }> = [];

  record(request: string, attempt: Attempt): void {
    this.entries.push({ request, attempt });
  }
}

const success = (stdout = ''): ExecutionOutcome => ({ type: 'success', stdout, stderr: '', exitCode: 0, durationMs: 1 });

const failure = (exitCode: number, stderr = ''): ExecutionOutcome => ({
  type: 'failure',
  stdout: '',
  stderr,
  exitCode,
  timedOut: false,
  durationMs: 1,
});

const classifier = createRiskClassifier();

function setup(
  provider: ScriptedProvider,
  executor: ScriptedExecutor,
  gate: RecordingGate = new RecordingGate('approved'),
  extra: Partial<RetryOrchestratorDeps> = {}
) {
  const sink = new MemorySink();
  const orchestrator = new RetryOrchestrator({ provider, classifier, gate, executor, attemptSink: sink, ...extra });
  return { orchestrator, sink, gate };
}

// ============================================================================
// Tests
// ============================================================================

describe('RetryOrchestrator', () => {
  describe('scenarios', () => {
    it('runs a safe command without confirmation', async () => {
      const provider = new ScriptedProvider([{ command: 'ls -la', rationale: 'List files' }]);
      const executor = new ScriptedExecutor(async () => success('total 0\n'));
      const { orchestrator, gate } = setup(provider, executor);

      const result = await orchestrator.run('list files');

      expect(result.status).toBe('completed');
      if (result.status !== 'completed') return;
      expect(result.outcome).toEqual(success('total 0\n'));
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0].tier).toBe('safe');
      expect(provider.prompts).toEqual(['list files']);
      expect(gate.calls).toHaveLength(0);
      expect(executor.commands).toEqual(['ls -la']);
    });

    it('stops without executing when a dangerous command is declined', async () => {
      const provider = new ScriptedProvider([{ command: 'rm -rf logs/*' }]);
      const executor = new ScriptedExecutor(async () => success());
      const gate = new RecordingGate('declined');
      const { orchestrator } = setup(provider, executor, gate);

      const result = await orchestrator.run('delete everything in logs');

      expect(result).toMatchObject({ status: 'completed', outcome: { type: 'declined' } });
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0].outcome).toEqual({ type: 'declined' });
      expect(gate.calls).toEqual([{ command: 'rm -rf logs/*', tier: 'dangerous' }]);
      expect(provider.prompts).toHaveLength(1);
      expect(executor.commands).toHaveLength(0);
    });

    it('feeds the failure back and succeeds on the second attempt', async () => {
      const provider = new ScriptedProvider([
        { command: 'find . -name *.py' },
        { command: 'find . -name "*.py"' },
      ]);
      const executor = new ScriptedExecutor(async (command) =>
        command === 'find . -name *.py' ? failure(127, 'command not found') : success('./main.py\n')
      );
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('find python files', 2);

      expect(result.status).toBe('completed');
      expect(provider.prompts).toEqual([
        'find python files',
        'find python files\n\nPrevious attempts failed:\n' +
          '- Attempt 1: `find . -name *.py` failed with exit code 127. stderr: command not found',
      ]);
      expect(result.attempts.map((attempt) => attempt.outcome.type)).toEqual(['failure', 'success']);
      expect(result.attempts[1].number).toBe(2);
    });

    it('returns RetriesExhausted after one attempt when maxRetries is 0', async () => {
      const provider = new ScriptedProvider([{ command: 'false' }]);
      const executor = new ScriptedExecutor(async () => failure(1));
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('fail please', 0);

      expect(result.status).toBe('retries_exhausted');
      expect(result.attempts).toHaveLength(1);
      expect(provider.prompts).toHaveLength(1);
    });
  });

  describe('properties', () => {
    it.each([0, 1, 2, 3, 5])('makes at most maxRetries + 1 provider calls (maxRetries=%i)', async (maxRetries) => {
      const provider = new ScriptedProvider([], { command: 'false' });
      const executor = new ScriptedExecutor(async () => failure(1));
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('never works', maxRetries);

      expect(result.status).toBe('retries_exhausted');
      expect(provider.prompts).toHaveLength(maxRetries + 1);
      expect(result.attempts).toHaveLength(maxRetries + 1);
    });

    it('keeps only the most recent failure summaries in the prompt', async () => {
      const provider = new ScriptedProvider([], { command: 'false' });
      const executor = new ScriptedExecutor(async () => failure(1));
      const { orchestrator } = setup(provider, executor, undefined, { failureContext: { maxSummaries: 2 } });

      await orchestrator.run('never works', 3);

      expect(provider.prompts[3]).toBe(
        'never works\n\nPrevious attempts failed:\n' +
          '- Attempt 2: `false` failed with exit code 1.\n' +
          '- Attempt 3: `false` failed with exit code 1.'
      );
    });

    it('asks for confirmation on caution commands and runs them when approved', async () => {
      const provider = new ScriptedProvider([{ command: 'mkdir build' }]);
      const executor = new ScriptedExecutor(async () => success());
      const { orchestrator, gate } = setup(provider, executor);

      const result = await orchestrator.run('make a build dir');

      expect(result.status).toBe('completed');
      expect(gate.calls).toEqual([{ command: 'mkdir build', tier: 'caution' }]);
      expect(executor.commands).toEqual(['mkdir build']);
    });

    it('hands every attempt to the sink with the request', async () => {
      const provider = new ScriptedProvider([{ command: 'false' }, { command: 'true' }]);
      const executor = new ScriptedExecutor(async (command) => (command === 'true' ? success() : failure(1)));
      const { orchestrator, sink } = setup(provider, executor);

      await orchestrator.run('  try twice  ');

      expect(sink.entries.map((entry) => [entry.request, entry.attempt.number])).toEqual([
        ['try twice', 1],
        ['try twice', 2],
      ]);
    });

    it('ignores a throwing sink', async () => {
      const provider = new ScriptedProvider([{ command: 'true' }]);
      const executor = new ScriptedExecutor(async () => success());
      const logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      const orchestrator = new RetryOrchestrator({
        provider,
        classifier,
        gate: new RecordingGate('approved'),
        executor,
        logger,
        attemptSink: {
          record: () => {
            throw new Error('disk full');
          },
        },
      });

      const result = await orchestrator.run('do it');

      expect(result.status).toBe('completed');
      expect(logger.warn).toHaveBeenCalledWith('[Orchestrator] Attempt sink failed', { error: expect.any(Error) });
    });
  });

  describe('provider errors', () => {
    it('retries a recoverable provider error with it in the context', async () => {
      const provider = new ScriptedProvider([
        new ProviderError('Model returned an empty response', 'openai', true),
        { command: 'ls' },
      ]);
      const executor = new ScriptedExecutor(async () => success());
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('list');

      expect(result.status).toBe('completed');
      expect(result.attempts[0].outcome).toEqual({
        type: 'provider_error',
        reason: 'Model returned an empty response',
        recoverable: true,
      });
      expect(provider.prompts[1]).toBe(
        'list\n\nPrevious attempts failed:\n- Attempt 1: no usable command (Model returned an empty response).'
      );
    });

    it('aborts immediately on a fatal provider error', async () => {
      const provider = new ScriptedProvider([new ProviderError('invalid api key', 'openai', false, 401)]);
      const executor = new ScriptedExecutor(async () => success());
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('list', 3);

      expect(result).toMatchObject({ status: 'aborted', reason: 'invalid api key', interrupted: false });
      expect(result.attempts).toHaveLength(1);
      expect(provider.prompts).toHaveLength(1);
    });

    it('exhausts the budget on repeated recoverable errors', async () => {
      const provider = new ScriptedProvider([], new ProviderError('rate limited', 'groq', true, 429));
      const executor = new ScriptedExecutor(async () => success());
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('list', 1);

      expect(result.status).toBe('retries_exhausted');
      expect(provider.prompts).toHaveLength(2);
      expect(executor.commands).toHaveLength(0);
    });
  });

  describe('input validation', () => {
    it('aborts an empty request without calling the provider', async () => {
      const provider = new ScriptedProvider([{ command: 'ls' }]);
      const { orchestrator } = setup(provider, new ScriptedExecutor(async () => success()));

      const result = await orchestrator.run('   ');

      expect(result).toEqual({ status: 'aborted', reason: 'empty request', interrupted: false, attempts: [] });
      expect(provider.prompts).toHaveLength(0);
    });

    it.each([-1, 1.5, Number.NaN])('rejects maxRetries=%p', async (maxRetries) => {
      const provider = new ScriptedProvider([{ command: 'ls' }]);
      const { orchestrator } = setup(provider, new ScriptedExecutor(async () => success()));

      await expect(orchestrator.run('list', maxRetries)).rejects.toBeInstanceOf(ConfigValidationError);
      expect(provider.prompts).toHaveLength(0);
    });
  });

  describe('interrupts', () => {
    it('returns interrupted while waiting for the provider', async () => {
      const controller = new AbortController();
      const provider = new ScriptedProvider([() => new Promise<Candidate>(() => undefined)]);
      const { orchestrator } = setup(provider, new ScriptedExecutor(async () => success()));

      const pending = orchestrator.run('list', 3, controller.signal);
      controller.abort();
      const result = await pending;

      expect(result).toEqual({ status: 'aborted', reason: 'interrupted', interrupted: true, attempts: [] });
    });

    it('hands the signal to the gate and returns interrupted while confirming', async () => {
      const controller = new AbortController();
      const seen: Array<AbortSignal | undefined> = [];
      const gate: IConfirmationGate = {
        confirm: (_candidate: Candidate, _tier: RiskTier, options?: ConfirmOptions) => {
          seen.push(options?.signal);
          return new Promise<ConfirmationDecision>(() => undefined);
        },
      };
      const provider = new ScriptedProvider([{ command: 'rm -rf logs/*' }]);
      const executor = new ScriptedExecutor(async () => success());
      const orchestrator = new RetryOrchestrator({ provider, classifier, gate, executor });

      const pending = orchestrator.run('clean logs', 3, controller.signal);
      await new Promise((resolve) => setImmediate(resolve));
      controller.abort();
      const result = await pending;

      expect(result).toMatchObject({ status: 'aborted', reason: 'interrupted', interrupted: true });
      expect(seen).toEqual([controller.signal]);
      expect(executor.commands).toHaveLength(0);
    });

    it('returns interrupted when the executor is aborted', async () => {
      const controller = new AbortController();
      const provider = new ScriptedProvider([{ command: 'sleep 10' }]);
      const executor = new ScriptedExecutor(
        (_command, options) =>
          new Promise<ExecutionOutcome>((_resolve, reject) => {
            options.signal?.addEventListener('abort', () => reject(new AbortError()));
            controller.abort();
          })
      );
      const { orchestrator } = setup(provider, executor);

      const result = await orchestrator.run('wait', 3, controller.signal);

      expect(result).toMatchObject({ status: 'aborted', interrupted: true });
      expect(provider.prompts).toHaveLength(1);
    });

    it('does nothing when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const provider = new ScriptedProvider([{ command: 'ls' }]);
      const { orchestrator } = setup(provider, new ScriptedExecutor(async () => success()));

      const result = await orchestrator.run('list', 3, controller.signal);

      expect(result).toMatchObject({ status: 'aborted', reason: 'interrupted', interrupted: true });
      expect(provider.prompts).toHaveLength(0);
    });
  });

  describe('events', () => {
    it('reports proposing, candidate and attempt in order', async () => {
      const calls: string[] = [];
      const provider = new ScriptedProvider([{ command: 'ls' }]);
      const { orchestrator } = setup(provider, new ScriptedExecutor(async () => success()), undefined, {
        events: {
          onProposing: (n) => calls.push(`proposing ${n}`),
          onCandidate: (n, candidate, tier) => calls.push(`candidate ${n} ${candidate.command} ${tier}`),
          onAttempt: (attempt) => calls.push(`attempt ${attempt.number} ${attempt.outcome.type}`),
        },
      });

      await orchestrator.run('list');

      expect(calls).toEqual(['proposing 1', 'candidate 1 ls safe', 'attempt 1 success']);
    });
  });
});
