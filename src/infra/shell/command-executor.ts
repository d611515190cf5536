import { spawn, type ChildProcess } from 'child_process';
import * as os from 'os';
import type {
  Candidate,
  ExecuteOptions,
  ExecutionOutcome,
  ICommandExecutor,
  OutputStream,
} from '../../domain/loop/types.js';
import { AbortError, describeAbortReason } from '../../app/execution/abort-signals.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 60000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
export const OUTPUT_TRUNCATED_MARKER = '\n[output truncated]';

/** Exit code reported when the command timed out (same as coreutils `timeout`) */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when the shell could not be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface ShellExecutorConfig {
  timeoutMs?: number;
  maxOutputBytes?: number;
  /** Defaults to $SHELL, then /bin/sh (cmd.exe on Windows) */
  shell?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Keeps the head of a stream up to `limit` bytes.
 */
class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = this.truncated || chunk.length > 0;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.truncated = this.truncated || kept.length < chunk.length;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? text + OUTPUT_TRUNCATED_MARKER : text;
  }
}

export function resolveShell(configured?: string): string | true {
  if (configured) return configured;
  if (process.platform === 'win32') return true;
  return process.env.SHELL || '/bin/sh';
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const number = os.constants.signals[signal];
  return typeof number === 'number' ? 128 + number : 1;
}

/**
 * Kill the child's whole process group so pipelines and background jobs go too.
 */
function killProcessTree(child: ChildProcess, logger: Logger): void {
  if (child.pid === undefined) {
    return;
  }

  // The group outlives its leader while background jobs hold the pipes open.
  if (process.platform !== 'win32') {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ESRCH') {
        return;
      }
      logger.debug('[Executor] Process group kill failed, killing child only', { pid: child.pid, error });
    }
  }

  if (child.exitCode === null && child.signalCode === null) {
    child.kill('SIGKILL');
  }
}

/**
 * Runs candidates in a fresh shell subprocess with the user's environment and cwd.
 */
export class ShellCommandExecutor implements ICommandExecutor {
  private readonly timeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly logger: Logger;

  constructor(private readonly config: ShellExecutorConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.maxOutputBytes = config.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.logger = config.logger ?? silentLogger;
  }

  execute(candidate: Candidate, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const { signal, onOutput } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    if (signal?.aborted) {
      return Promise.reject(new AbortError(describeAbortReason(signal)));
    }

    return new Promise<ExecutionOutcome>((resolve, reject) => {
      const startedAt = Date.now();
      const stdout = new OutputBuffer(this.maxOutputBytes);
      const stderr = new OutputBuffer(this.maxOutputBytes);
      let timedOut = false;
      let aborted = false;
      let spawnError: Error | undefined;
      let settled = false;

      this.logger.debug('[Executor] Spawning', { command: candidate.command, timeoutMs });

      const child = spawn(candidate.command, {
        shell: resolveShell(this.config.shell),
        cwd: this.config.cwd ?? process.cwd(),
        env: this.config.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      });

      const collect = (buffer: OutputBuffer, stream: OutputStream) => (chunk: Buffer) => {
        buffer.push(chunk);
        onOutput?.(chunk.toString('utf-8'), stream);
      };
      child.stdout?.on('data', collect(stdout, 'stdout'));
      child.stderr?.on('data', collect(stderr, 'stderr'));

      const timer = setTimeout(() => {
        timedOut = true;
        killProcessTree(child, this.logger);
      }, timeoutMs);

      const onAbort = () => {
        aborted = true;
        killProcessTree(child, this.logger);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);

        const durationMs = Date.now() - startedAt;

        if (aborted && signal) {
          reject(new AbortError(describeAbortReason(signal)));
          return;
        }

        if (timedOut) {
          resolve({
            type: 'failure',
            stdout: stdout.toString(),
            stderr: stderr.toString(),
            exitCode: TIMEOUT_EXIT_CODE,
            timedOut: true,
            reason: `timed out after ${timeoutMs}ms`,
            durationMs,
          });
          return;
        }

        if (spawnError) {
          resolve({
            type: 'failure',
            stdout: stdout.toString(),
            stderr: stderr.toString() || spawnError.message,
            exitCode: SPAWN_FAILURE_EXIT_CODE,
            timedOut: false,
            reason: `failed to start: ${spawnError.message}`,
            durationMs,
          });
          return;
        }

        const code = exitCode ?? signalExitCode(exitSignal);
        if (code === 0) {
          resolve({ type: 'success', stdout: stdout.toString(), stderr: stderr.toString(), exitCode: 0, durationMs });
          return;
        }

        resolve({
          type: 'failure',
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          exitCode: code,
          timedOut: false,
          reason: exitSignal ? `killed by ${exitSignal}` : undefined,
          durationMs,
        });
      };

      child.on('error', (error) => {
        this.logger.warn('[Executor] Spawn error', { command: candidate.command, error: error.message });
        spawnError = error;
        // 'close' never follows when the process could not be spawned
        if (child.pid === undefined) {
          finish(null, null);
        }
      });

      child.on('close', (code, exitSignal) => {
        finish(code, exitSignal);
      });
    });
  }
}
