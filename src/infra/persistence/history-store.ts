import * as fs from 'fs';
import * as path from 'path';
import { silentLogger, type Logger } from '../logging/logger.js';

/**
 * Request history, one request per line, oldest first.
 */
export class HistoryStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Append a request unless it equals the last entry.
   * Returns false when nothing was written.
   */
  append(request: string): boolean {
    const line = request.replace(/\s*\n\s*/g, ' ').trim();
    if (!line) return false;

    try {
      const entries = this.read();
      if (entries[entries.length - 1] === line) {
        return false;
      }
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      fs.appendFileSync(this.filePath, line + '\n', { mode: 0o600 });
      return true;
    } catch (error) {
      this.logger.warn('[History] Failed to append', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Most recent `limit` entries (all when omitted), oldest first.
   */
  read(limit?: number): string[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const entries = fs
      .readFileSync(this.filePath, 'utf-8')
      .split('\n')
      .filter((entry) => entry.trim().length > 0);
    return limit === undefined ? entries : entries.slice(-limit);
  }
}
