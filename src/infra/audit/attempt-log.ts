import * as fs from 'fs';
import * as path from 'path';
import type { Attempt, IAttemptSink } from '../../domain/loop/types.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export interface AttemptLogEntry {
  timestamp: string;
  request: string;
  attempt: number;
  prompt: string;
  candidate: Attempt['candidate'] | null;
  tier: Attempt['tier'] | null;
  outcome: Attempt['outcome'];
  durationMs: number;
}

export function toAttemptLogEntry(request: string, attempt: Attempt): AttemptLogEntry {
  return {
    timestamp: new Date(attempt.finishedAt).toISOString(),
    request,
    attempt: attempt.number,
    prompt: attempt.prompt,
    candidate: attempt.candidate ?? null,
    tier: attempt.tier ?? null,
    outcome: attempt.outcome,
    durationMs: attempt.finishedAt - attempt.startedAt,
  };
}

/**
 * Appends one JSON line per attempt. Write failures are logged and dropped.
 */
export class JsonlAttemptLog implements IAttemptSink {
  private dirReady = false;

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  record(request: string, attempt: Attempt): void {
    try {
      if (!this.dirReady) {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
        this.dirReady = true;
      }
      fs.appendFileSync(this.filePath, JSON.stringify(toAttemptLogEntry(request, attempt)) + '\n', { mode: 0o600 });
    } catch (error) {
      this.logger.warn('[AttemptLog] Failed to write attempt', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
