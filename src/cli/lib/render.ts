import chalk from 'chalk';
import type { Attempt, Candidate, LoopResult } from '../../domain/loop/types.js';
import type { RiskTier } from '../../domain/risk/types.js';

const TIER_STYLES: Record<RiskTier, (text: string) => string> = {
  safe: chalk.green,
  caution: chalk.yellow,
  dangerous: chalk.red.bold,
};

export function formatTier(tier: RiskTier): string {
  return TIER_STYLES[tier](tier.toUpperCase());
}

export function formatCandidate(candidate: Candidate, tier: RiskTier): string {
  const lines = [`${TIER_STYLES[tier]('$')} ${chalk.bold(candidate.command)}  ${chalk.dim('[')}${formatTier(tier)}${chalk.dim(']')}`];
  if (candidate.rationale) {
    lines.push(chalk.dim(`  ${candidate.rationale}`));
  }
  return lines.join('\n');
}

export function formatAttempt(attempt: Attempt): string {
  const label = chalk.dim(`#${attempt.number}`);
  const command = attempt.candidate ? `\`${attempt.candidate.command}\`` : chalk.dim('(no command)');
  const outcome = attempt.outcome;

  switch (outcome.type) {
    case 'success':
      return `${label} ${command} ${chalk.green('succeeded')}`;
    case 'failure':
      return `${label} ${command} ${chalk.red(outcome.timedOut ? outcome.reason ?? 'timed out' : `exited ${outcome.exitCode}`)}`;
    case 'declined':
      return `${label} ${command} ${chalk.yellow('declined')}`;
    case 'provider_error':
      return `${label} ${command} ${chalk.red(`provider error: ${outcome.reason}`)}`;
  }
}

/**
 * Closing line(s) for a run; the attempt list is included when the run did not succeed.
 */
export function formatResult(result: LoopResult): string {
  switch (result.status) {
    case 'completed':
      if (result.outcome.type === 'success') {
        return chalk.green('✓ Done');
      }
      return chalk.yellow('✗ Declined, nothing was executed');
    case 'retries_exhausted':
      return [
        chalk.red(`✗ Gave up after ${result.attempts.length} attempt${result.attempts.length === 1 ? '' : 's'}:`),
        ...result.attempts.map((attempt) => `  ${formatAttempt(attempt)}`),
      ].join('\n');
    case 'aborted': {
      const head = result.interrupted ? chalk.yellow('✗ Interrupted') : chalk.red(`✗ Aborted: ${result.reason}`);
      return [head, ...result.attempts.map((attempt) => `  ${formatAttempt(attempt)}`)].join('\n');
    }
  }
}

/**
 * Show the first and last few characters of a secret
 */
export function maskSecret(secret: string | undefined): string {
  if (!secret) return chalk.dim('(not set)');
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}
