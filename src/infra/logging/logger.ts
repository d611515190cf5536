import * as fs from 'fs';
import * as path from 'path';
import { Console } from 'console';

/**
 * Components log through this subset of Console, prefixing messages with `[Component]`
 * and passing structured context as the second argument.
 */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export interface FileLogger extends Logger {
  readonly filePath: string;
  close(): Promise<void>;
}

type Level = keyof Logger;

export interface FileLoggerOptions {
  /** Also print entries to stderr */
  mirrorToStderr?: boolean;
  /** Lowest level written to the file (default: info) */
  level?: Level;
  now?: () => Date;
}

const LEVEL_ORDER: Level[] = ['debug', 'info', 'warn', 'error'];

export function getLogFilePath(logDir: string, date: Date = new Date()): string {
  const stamp = date.toISOString().slice(0, 10).replace(/-/g, '');
  return path.join(logDir, `cmdwise-${stamp}.log`);
}

/**
 * Daily log file under `logDir`, one line per entry.
 * Write failures disable the file sink instead of reaching the caller.
 */
export function createFileLogger(logDir: string, options: FileLoggerOptions = {}): FileLogger {
  const now = options.now ?? (() => new Date());
  const filePath = getLogFilePath(logDir, now());
  const minLevel = LEVEL_ORDER.indexOf(options.level ?? 'info');
  const mirror = options.mirrorToStderr ? new Console({ stdout: process.stderr, stderr: process.stderr }) : null;

  let stream: fs.WriteStream | null = null;
  let fileConsole: Console | null = null;

  try {
    fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
    stream = fs.createWriteStream(filePath, { flags: 'a' });
    fileConsole = new Console({ stdout: stream, stderr: stream });
    stream.on('error', (error) => {
      fileConsole = null;
      mirror?.warn(`[Logger] Log file disabled: ${error.message}`);
    });
  } catch (error) {
    mirror?.warn(`[Logger] Could not open ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    stream = null;
  }

  const write = (level: Level, args: unknown[]): void => {
    if (LEVEL_ORDER.indexOf(level) < minLevel) return;
    const prefix = `${now().toISOString()} ${level.toUpperCase()}`;
    fileConsole?.[level](prefix, ...args);
    mirror?.[level](...args);
  };

  return {
    filePath,
    debug: (...args: unknown[]) => write('debug', args),
    info: (...args: unknown[]) => write('info', args),
    warn: (...args: unknown[]) => write('warn', args),
    error: (...args: unknown[]) => write('error', args),
    close: () =>
      new Promise<void>((resolve) => {
        if (!stream || stream.destroyed) {
          resolve();
          return;
        }
        stream.end(() => resolve());
      }),
  };
}
