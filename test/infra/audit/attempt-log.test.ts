import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonlAttemptLog, toAttemptLogEntry } from '../../../src/infra/audit/attempt-log.js';
import type { Attempt } from '../../../src/domain/loop/types.js';

const failedAttempt: Attempt = {
  number: 1,
  prompt: 'show disk usage',
  candidate: { command: 'du -sh', rationale: 'Summarise disk usage' },
  tier: 'safe',
  outcome: { type: 'failure', stdout: '', stderr: 'du: cannot access', exitCode: 1, timedOut: false, durationMs: 12 },
  startedAt: Date.UTC(2026, 0, 2, 3, 4, 5),
  finishedAt: Date.UTC(2026, 0, 2, 3, 4, 6),
};

const providerErrorAttempt: Attempt = {
  number: 2,
  prompt: 'show disk usage\n\nPrevious attempts failed:\n- Attempt 1',
  outcome: { type: 'provider_error', reason: 'rate limited', recoverable: true },
  startedAt: Date.UTC(2026, 0, 2, 3, 4, 7),
  finishedAt: Date.UTC(2026, 0, 2, 3, 4, 7, 250),
};

describe('toAttemptLogEntry', () => {
  it('flattens an attempt into a log entry', () => {
    expect(toAttemptLogEntry('show disk usage', failedAttempt)).toEqual({
      timestamp: '2026-01-02T03:04:06.000Z',
      request: 'show disk usage',
      attempt: 1,
      prompt: 'show disk usage',
      candidate: { command: 'du -sh', rationale: 'Summarise disk usage' },
      tier: 'safe',
      outcome: failedAttempt.outcome,
      durationMs: 1000,
    });
  });

  it('uses null for a missing candidate and tier', () => {
    expect(toAttemptLogEntry('x', providerErrorAttempt)).toMatchObject({ candidate: null, tier: null, durationMs: 250 });
  });
});

describe('JsonlAttemptLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cmdwise-attempts-'));
  });

  it('appends one JSON line per attempt', () => {
    const filePath = path.join(dir, 'nested', 'attempts.jsonl');
    const log = new JsonlAttemptLog(filePath);

    log.record('show disk usage', failedAttempt);
    log.record('show disk usage', providerErrorAttempt);

    const lines = fs.readFileSync(filePath, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({ attempt: 1, tier: 'safe' });
    expect(JSON.parse(lines[1])).toMatchObject({ attempt: 2, outcome: { type: 'provider_error' } });
    if (process.platform !== 'win32') {
      expect(fs.statSync(filePath).mode & 0o777).toBe(0o600);
    }
  });

  it('logs and drops write failures', () => {
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, '');
    const warn = jest.fn();
    const log = new JsonlAttemptLog(path.join(blocker, 'attempts.jsonl'), {
      debug: jest.fn(),
      info: jest.fn(),
      warn,
      error: jest.fn(),
    });

    expect(() => log.record('x', failedAttempt)).not.toThrow();
    expect(warn).toHaveBeenCalledWith(
      '[AttemptLog] Failed to write attempt',
      expect.objectContaining({ file: path.join(blocker, 'attempts.jsonl') })
    );
  });
});
