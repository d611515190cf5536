import type { FailureOutcome } from '../../domain/loop/types.js';

export interface FailureContextLimits {
  /** Cap for one summary, in UTF-8 bytes */
  maxSummaryBytes: number;
  /** Only the most recent summaries are kept */
  maxSummaries: number;
  maxStdoutBytes: number;
  maxStderrBytes: number;
}

export const DEFAULT_FAILURE_CONTEXT_LIMITS: FailureContextLimits = {
  maxSummaryBytes: 600,
  maxSummaries: 5,
  maxStdoutBytes: 2000,
  maxStderrBytes: 500,
};

export const TRUNCATION_MARKER = '...[truncated]';

/**
 * Cut `text` to at most `maxBytes` UTF-8 bytes without splitting a character.
 * The marker counts toward the budget.
 */
export function truncateBytes(text: string, maxBytes: number, marker: string = TRUNCATION_MARKER): string {
  const bytes = Buffer.from(text, 'utf-8');
  if (bytes.length <= maxBytes) return text;

  const markerBytes = Buffer.byteLength(marker, 'utf-8');
  const suffix = markerBytes < maxBytes ? marker : '';
  let end = maxBytes - Buffer.byteLength(suffix, 'utf-8');

  // step back over continuation bytes (10xxxxxx)
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }

  return bytes.subarray(0, end).toString('utf-8') + suffix;
}

function describeOutput(outcome: FailureOutcome, limits: FailureContextLimits): string {
  const stderr = outcome.stderr.trim();
  if (stderr) {
    return ` stderr: ${truncateBytes(stderr, limits.maxStderrBytes)}`;
  }
  const stdout = outcome.stdout.trim();
  if (stdout) {
    return ` stdout: ${truncateBytes(stdout, limits.maxStdoutBytes)}`;
  }
  return '';
}

/**
 * One-line account of a failed execution, e.g.
 * "Attempt 1: `find . -name *.py` failed with exit code 127. stderr: find: not found"
 */
export function summarizeExecutionFailure(
  attemptNumber: number,
  command: string,
  outcome: FailureOutcome,
  limits: FailureContextLimits = DEFAULT_FAILURE_CONTEXT_LIMITS
): string {
  const what = outcome.timedOut
    ? outcome.reason ?? 'timed out'
    : `failed with exit code ${outcome.exitCode}`;
  const summary = `Attempt ${attemptNumber}: \`${command}\` ${what}.${describeOutput(outcome, limits)}`;
  return truncateBytes(summary, limits.maxSummaryBytes);
}

export function summarizeProviderError(
  attemptNumber: number,
  reason: string,
  limits: FailureContextLimits = DEFAULT_FAILURE_CONTEXT_LIMITS
): string {
  return truncateBytes(`Attempt ${attemptNumber}: no usable command (${reason}).`, limits.maxSummaryBytes);
}

/**
 * Rolling window of failure summaries fed into the next prompt.
 */
export class FailureContext {
  private summaries: string[] = [];

  constructor(private readonly limits: FailureContextLimits = DEFAULT_FAILURE_CONTEXT_LIMITS) {}

  add(summary: string): void {
    this.summaries.push(truncateBytes(summary, this.limits.maxSummaryBytes));
    if (this.summaries.length > this.limits.maxSummaries) {
      this.summaries = this.summaries.slice(-this.limits.maxSummaries);
    }
  }

  getSummaries(): readonly string[] {
    return this.summaries;
  }

  isEmpty(): boolean {
    return this.summaries.length === 0;
  }
}

export function buildPrompt(request: string, context: FailureContext): string {
  if (context.isEmpty()) {
    return request;
  }
  const lines = context.getSummaries().map((summary) => `- ${summary}`);
  return `${request}\n\nPrevious attempts failed:\n${lines.join('\n')}`;
}
