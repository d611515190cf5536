import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  EXIT_CODES,
  exitCodeForResult,
  type ExitCode,
  type IProviderClient,
} from '../../domain/loop/types.js';
import { requiresConfirmation, type IRiskClassifier } from '../../domain/risk/types.js';
import type { IConfirmationGate } from '../../domain/confirmation/types.js';
import { RetryOrchestrator } from '../../app/orchestrator/retry-orchestrator.js';
import { CommandProviderClient } from '../../app/provider/command-provider.js';
import { createApproveAllGate, createDeclineAllGate } from '../../app/confirmation/policy-gate.js';
import { isAbortError } from '../../app/execution/abort-signals.js';
import {
  getAttemptLogPath,
  getHistoryPath,
  getLogDir,
  getProviderCredential,
  loadSettings,
  type CmdwiseSettings,
  type SettingsOverrides,
} from '../../infra/config/index.js';
import { createLLMProvider } from '../../infra/llm/provider-factory.js';
import { createRiskClassifier } from '../../infra/risk/risk-classifier.js';
import { ShellCommandExecutor } from '../../infra/shell/command-executor.js';
import { getHostInfo } from '../../infra/shell/system-info.js';
import { JsonlAttemptLog } from '../../infra/audit/attempt-log.js';
import { HistoryStore } from '../../infra/persistence/history-store.js';
import { createFileLogger, type Logger } from '../../infra/logging/logger.js';
import { InteractiveConfirmationGate } from '../lib/interactive-confirmation.js';
import { formatAttempt, formatCandidate, formatResult } from '../lib/render.js';
import { UsageError, parseNonNegativeInt, parsePositiveInt } from '../lib/usage-error.js';
import { describeError } from '../lib/errors.js';

export interface RunCommandOptions {
  maxRetries?: string;
  provider?: string;
  model?: string;
  baseUrl?: string;
  timeout?: string;
  yes?: boolean;
  /** false when --no-confirm was given */
  confirm?: boolean;
  decline?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  /** false when --no-history was given */
  history?: boolean;
}

export function toSettingsOverrides(options: RunCommandOptions): SettingsOverrides {
  if ((options.yes || options.confirm === false) && options.decline) {
    throw new UsageError('--yes/--no-confirm and --decline cannot be combined');
  }

  const overrides: SettingsOverrides = {};
  if (options.maxRetries !== undefined) overrides.maxRetries = parseNonNegativeInt(options.maxRetries, '--max-retries');
  if (options.timeout !== undefined) overrides.commandTimeoutMs = parsePositiveInt(options.timeout, '--timeout');
  if (options.provider) overrides.provider = options.provider;
  if (options.model) overrides.model = options.model;
  if (options.baseUrl) overrides.baseUrl = options.baseUrl;
  if (options.yes || options.confirm === false) overrides.confirmation = 'approve';
  if (options.decline) overrides.confirmation = 'decline';
  if (options.history === false) overrides.history = false;
  return overrides;
}

export interface GateSelection {
  gate: IConfirmationGate;
  interactive: boolean;
  notice?: string;
}

export function selectConfirmationGate(
  settings: Pick<CmdwiseSettings, 'confirmation'>,
  isTTY: boolean,
  logger?: Logger
): GateSelection {
  switch (settings.confirmation) {
    case 'approve':
      return { gate: createApproveAllGate(logger), interactive: false };
    case 'decline':
      return { gate: createDeclineAllGate(logger), interactive: false };
    case 'prompt':
      if (isTTY) {
        return { gate: new InteractiveConfirmationGate(), interactive: true };
      }
      return {
        gate: createDeclineAllGate(logger),
        interactive: false,
        notice: 'No terminal attached: risky commands will be declined (pass --yes to approve them).',
      };
  }
}

async function dryRun(
  request: string,
  provider: IProviderClient,
  classifier: IRiskClassifier,
  spinner: Ora,
  signal: AbortSignal
): Promise<ExitCode> {
  spinner.start('Thinking...');
  const candidate = await provider.propose(request, { signal });
  spinner.stop();
  const tier = classifier.classify(candidate);
  console.log(formatCandidate(candidate, tier));
  console.log(chalk.dim('Dry run: not executed.'));
  return EXIT_CODES.success;
}

export async function runCommand(words: string[], options: RunCommandOptions): Promise<ExitCode> {
  const request = words.join(' ').trim();
  if (!request) {
    throw new UsageError('Describe what you want to do, e.g. `cmdwise list files by size`');
  }

  const settings = loadSettings(toSettingsOverrides(options));
  const logger = createFileLogger(getLogDir(), {
    mirrorToStderr: options.verbose === true,
    level: options.verbose ? 'debug' : 'info',
  });
  const spinner = ora({ stream: process.stderr });
  const controller = new AbortController();
  const onSigint = () => {
    spinner.stop();
    controller.abort('interrupted');
  };
  process.once('SIGINT', onSigint);

  try {
    const classifier = createRiskClassifier({
      path: settings.riskPatternsPath || undefined,
      extend: settings.extendRiskPatterns,
    });
    const llm = createLLMProvider(
      {
        provider: settings.provider,
        model: settings.model,
        baseUrl: settings.baseUrl,
        timeoutMs: settings.providerTimeoutMs,
      },
      { credential: getProviderCredential(settings.provider), logger }
    );
    const provider = new CommandProviderClient({
      llm,
      host: getHostInfo(),
      language: settings.language,
      timeoutMs: settings.providerTimeoutMs,
      logger,
    });

    if (settings.history) {
      new HistoryStore(getHistoryPath(), logger).append(request);
    }

    if (options.dryRun) {
      return await dryRun(request, provider, classifier, spinner, controller.signal);
    }

    const selection = selectConfirmationGate(settings, Boolean(process.stdin.isTTY && process.stdout.isTTY), logger);
    if (selection.notice) {
      console.error(chalk.yellow(selection.notice));
    }

    const orchestrator = new RetryOrchestrator({
      provider,
      classifier,
      gate: selection.gate,
      executor: new ShellCommandExecutor({ timeoutMs: settings.commandTimeoutMs, logger }),
      attemptSink: settings.attemptLog ? new JsonlAttemptLog(getAttemptLogPath(), logger) : undefined,
      logger,
      failureContext: settings.failureContext,
      execution: {
        onOutput: (chunk, stream) => {
          (stream === 'stdout' ? process.stdout : process.stderr).write(chunk);
        },
      },
      events: {
        onProposing: (attemptNumber) => {
          spinner.start(attemptNumber === 1 ? 'Thinking...' : `Retrying (attempt ${attemptNumber})...`);
        },
        onCandidate: (_attemptNumber, candidate, tier) => {
          spinner.stop();
          // the interactive gate shows the candidate itself
          if (!(selection.interactive && requiresConfirmation(tier))) {
            console.error(formatCandidate(candidate, tier));
          }
        },
        onAttempt: (attempt) => {
          spinner.stop();
          if (attempt.outcome.type === 'failure' || attempt.outcome.type === 'provider_error') {
            console.error(formatAttempt(attempt));
          }
        },
      },
    });

    const result = await orchestrator.run(request, settings.maxRetries, controller.signal);
    console.error(formatResult(result));
    return exitCodeForResult(result);
  } catch (error) {
    spinner.stop();
    if (isAbortError(error) || controller.signal.aborted) {
      console.error(chalk.yellow('✗ Interrupted'));
      return EXIT_CODES.interrupted;
    }
    if (error instanceof UsageError) throw error;
    logger.error('[Run] Aborted', { error: describeError(error) });
    console.error(chalk.red(`✗ ${describeError(error)}`));
    return EXIT_CODES.aborted;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await logger.close();
  }
}
