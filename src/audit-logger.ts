/**
 * Audit Logger - Records one JSON line per package inspection
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { describeError } from './errors';
import { ModuleType, type LogEntry, type LogReadOptions } from './types';

export const DEFAULT_AUDIT_LOG_PATH = path.join(os.homedir(), '.coursepack', 'audit.log');
export const DEFAULT_AUDIT_MAX_SIZE = 10 * 1024 * 1024;

const LogEntrySchema = z.object({
  timestamp: z.string(),
  rootPath: z.string(),
  status: z.enum(['parsed-valid', 'parsed-with-warnings', 'parsed-with-errors', 'detection-failed', 'parse-failed']),
  moduleType: z.nativeEnum(ModuleType).optional(),
  errorCount: z.number().int().nonnegative(),
  warningCount: z.number().int().nonnegative(),
  failure: z.string().optional()
});

export class AuditLogger {
  private readonly logPath: string;

  constructor(logPath: string = DEFAULT_AUDIT_LOG_PATH, private readonly maxSize: number = DEFAULT_AUDIT_MAX_SIZE) {
    this.logPath = logPath === '' ? DEFAULT_AUDIT_LOG_PATH : logPath;
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Append an entry. Write failures are reported on stderr and never
   * interrupt the inspection that produced the entry.
   */
  log(entry: LogEntry): void {
    try {
      this.ensureLogDirectory();

      if (this.shouldRotate()) {
        this.rotate();
      }

      fs.appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to write audit log: ${describeError(error)}`);
    }
  }

  /**
   * Move the current log aside with a timestamp suffix; the next write
   * starts a fresh file
   */
  rotate(): void {
    try {
      if (!fs.existsSync(this.logPath)) {
        return;
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.logPath, `${this.logPath}.${timestamp}`);
    } catch (error) {
      console.error(`Warning: Failed to rotate audit log: ${describeError(error)}`);
    }
  }

  /**
   * Read entries, oldest first. The limit (default 50) keeps the most recent.
   * Lines that do not decode as entries are reported on stderr and skipped.
   */
  read(options: LogReadOptions = {}): LogEntry[] {
    let content: string;
    try {
      if (!fs.existsSync(this.logPath)) {
        return [];
      }
      content = fs.readFileSync(this.logPath, 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to read audit log: ${describeError(error)}`);
      return [];
    }

    const decoded: LogEntry[] = [];
    for (const line of content.split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      const parsed = this.parseLine(line);
      if (parsed === null) {
        console.error(`Warning: Invalid entry in audit log: ${line}`);
      } else {
        decoded.push(parsed);
      }
    }

    return AuditLogger.select(decoded, options);
  }

  private static select(entries: LogEntry[], { status, since, limit = 50 }: LogReadOptions): LogEntry[] {
    const matching = entries.filter(entry =>
      (status === undefined || entry.status === status) &&
      (since === undefined || new Date(entry.timestamp) >= since)
    );
    return matching.length > limit ? matching.slice(matching.length - limit) : matching;
  }

  private parseLine(line: string): LogEntry | null {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      return null;
    }
    const result = LogEntrySchema.safeParse(value);
    return result.success ? result.data : null;
  }

  private ensureLogDirectory(): void {
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
  }

  private shouldRotate(): boolean {
    const size = fs.statSync(this.logPath, { throwIfNoEntry: false })?.size ?? 0;
    return size > 0 && size >= this.maxSize;
  }
}
