/**
 * Unit tests for AuditLogger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AuditLogger } from '../../src/audit-logger';
import { ModuleType, type LogEntry } from '../../src/types';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: '2026-03-02T10:30:00.000Z',
    rootPath: '/courses/ladder',
    status: 'parsed-valid',
    moduleType: ModuleType.AICC,
    errorCount: 0,
    warningCount: 0,
    ...overrides
  };
}

describe('AuditLogger', () => {
  let tempDir: string;
  let logPath: string;
  let logger: AuditLogger;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'coursepack-audit-'));
    logPath = path.join(tempDir, 'audit.log');
    logger = new AuditLogger(logPath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('log()', () => {
    it('should create the log directory if it does not exist', () => {
      const nestedLogPath = path.join(tempDir, 'nested', 'dir', 'audit.log');

      new AuditLogger(nestedLogPath).log(entry());

      expect(fs.existsSync(nestedLogPath)).toBe(true);
    });

    it('should write each entry as single-line JSON', () => {
      const failed = entry({ status: 'detection-failed', moduleType: undefined, failure: 'Unknown module type' });

      logger.log(failed);

      const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toEqual({
        timestamp: '2026-03-02T10:30:00.000Z',
        rootPath: '/courses/ladder',
        status: 'detection-failed',
        errorCount: 0,
        warningCount: 0,
        failure: 'Unknown module type'
      });
    });

    it('should append entries', () => {
      logger.log(entry());
      logger.log(entry({ status: 'parsed-with-errors', errorCount: 2 }));

      expect(fs.readFileSync(logPath, 'utf-8').trim().split('\n')).toHaveLength(2);
    });

    it('should warn instead of throwing when the log cannot be written', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const blocker = path.join(tempDir, 'not-a-directory');
      fs.writeFileSync(blocker, '');

      expect(() => new AuditLogger(path.join(blocker, 'audit.log')).log(entry())).not.toThrow();
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0][0]).startsWith('Warning: Failed to write audit log: ')).toBe(true);
    });
  });

  describe('rotate()', () => {
    it('should rotate the file once it reaches maxSize', () => {
      const smallLogger = new AuditLogger(logPath, 100);

      for (let i = 0; i < 3; i++) {
        smallLogger.log(entry({ rootPath: `/courses/${i}` }));
      }

      const backups = fs.readdirSync(tempDir).filter(f => f.startsWith('audit.log.'));
      expect(backups.length).toBeGreaterThan(0);
      expect(smallLogger.read().map(e => e.rootPath)).toEqual(['/courses/2']);
    });

    it('should name backups with a timestamp', () => {
      logger.log(entry());
      logger.rotate();

      const backups = fs.readdirSync(tempDir).filter(f => f.startsWith('audit.log.'));
      expect(backups).toHaveLength(1);
      expect(backups[0]).toMatch(/^audit\.log\.\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z$/);
      expect(fs.existsSync(logPath)).toBe(false);
    });

    it('should do nothing without a log file', () => {
      expect(() => logger.rotate()).not.toThrow();
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });
  });

  describe('read()', () => {
    beforeEach(() => {
      logger.log(entry({ timestamp: '2026-03-02T10:30:00.000Z', rootPath: '/a' }));
      logger.log(entry({ timestamp: '2026-03-02T10:31:00.000Z', rootPath: '/b', status: 'parsed-with-errors', errorCount: 1 }));
      logger.log(entry({ timestamp: '2026-03-02T10:32:00.000Z', rootPath: '/c' }));
    });

    it('should read all entries oldest first', () => {
      expect(logger.read().map(e => e.rootPath)).toEqual(['/a', '/b', '/c']);
    });

    it('should filter by status', () => {
      expect(logger.read({ status: 'parsed-with-errors' }).map(e => e.rootPath)).toEqual(['/b']);
    });

    it('should filter by date', () => {
      const entries = logger.read({ since: new Date('2026-03-02T10:31:30.000Z') });

      expect(entries.map(e => e.rootPath)).toEqual(['/c']);
    });

    it('should keep the most recent entries under a limit', () => {
      expect(logger.read({ limit: 2 }).map(e => e.rootPath)).toEqual(['/b', '/c']);
    });

    it('should return nothing for a missing log', () => {
      expect(new AuditLogger(path.join(tempDir, 'nonexistent.log')).read()).toEqual([]);
    });

    it('should skip lines that are not valid entries', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      fs.appendFileSync(logPath, 'invalid json line\n{"timestamp":"x","status":"bogus"}\n', 'utf-8');

      expect(logger.read()).toHaveLength(3);
      expect(errorSpy).toHaveBeenCalledWith('Warning: Invalid entry in audit log: invalid json line');
    });
  });

  it('should fall back to the default path', () => {
    expect(new AuditLogger().getLogPath()).toBe(path.join(os.homedir(), '.coursepack', 'audit.log'));
  });
});
