/**
 * Integration tests for the coursepack CLI
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AuditLogger } from '../../src/audit-logger';
import { CLI, VERSION } from '../../src/cli';
import { DEFAULT_CONFIG } from '../../src/config-loader';
import type { InspectorConfig } from '../../src/types';

const CRS = '[Course]\nCourse_ID=C1\nCourse_Title=Ladder Safety\n';
const AU = 'System_ID,File_Name\nA1,lesson1.html\nA2,lesson2.html\n';
const PRE = 'structure_element,prerequisite\nA2,A1\n';

const SCORM_TREE = {
  kind: 'scorm12',
  identifier: 'M1',
  organizations: {
    defaultOrganization: 'O1',
    organizations: [{ identifier: 'O1', title: 'Main', items: [{ identifier: 'I1', identifierref: 'R1' }] }]
  },
  resources: {
    resources: [
      { identifier: 'R1', href: 'index.html', scormType: 'sco' },
      { identifier: 'SPARE', href: 'spare.html' }
    ]
  }
};

describe('CLI', () => {
  let tempDir: string;
  let packageDir: string;
  let logPath: string;
  let config: InspectorConfig;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const stdout = (): string => logSpy.mock.calls.map(call => call.map(String).join(' ')).join('\n');
  const stderr = (): string => errorSpy.mock.calls.map(call => call.map(String).join(' ')).join('\n');
  const run = (...args: string[]): Promise<number> => new CLI({ config }).run(args);

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'coursepack-cli-'));
    packageDir = path.join(tempDir, 'ladder');
    fs.mkdirSync(packageDir);
    fs.writeFileSync(path.join(packageDir, 'course.crs'), CRS);
    fs.writeFileSync(path.join(packageDir, 'course.au'), AU);
    fs.writeFileSync(path.join(packageDir, 'course.pre'), PRE);

    logPath = path.join(tempDir, 'logs', 'audit.log');
    config = {
      ...DEFAULT_CONFIG,
      audit: { enabled: true, path: logPath, maxSize: DEFAULT_CONFIG.audit.maxSize },
      output: { format: 'text', color: false, verbose: false }
    };

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('general', () => {
    it('should print the version', async () => {
      expect(await run('--version')).toBe(0);
      expect(stdout()).toBe(`coursepack-inspector v${VERSION}`);
    });

    it('should print usage, failing only without arguments', async () => {
      expect(await run('--help')).toBe(0);
      expect(await run()).toBe(1);
      expect(logSpy.mock.calls[0][0]).toContain('coursepack inspect <dir>');
    });

    it('should reject unknown commands and flags', async () => {
      expect(await run('frobnicate')).toBe(1);
      expect(await run('inspect', packageDir, '--fast')).toBe(1);
      expect(await run('inspect')).toBe(1);

      expect(errorSpy.mock.calls.map(call => call[1])).toEqual([
        'Unknown command: frobnicate. Run "coursepack --help" for usage.',
        'Unknown flag: --fast',
        'inspect requires exactly one argument. Run "coursepack --help" for usage.'
      ]);
    });
  });

  describe('inspect', () => {
    it('should report a valid package and record it in the audit log', async () => {
      expect(await run('inspect', packageDir)).toBe(0);

      expect(stdout()).toBe([
        `✅ VALID: ${path.resolve(packageDir)}`,
        'Type: AICC',
        'Title: Ladder Safety',
        'Launch: lesson1.html'
      ].join('\n'));

      const entries = new AuditLogger(logPath).read();
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        rootPath: path.resolve(packageDir),
        status: 'parsed-valid',
        moduleType: 'aicc',
        errorCount: 0,
        warningCount: 0
      });
    });

    it('should report JSON', async () => {
      expect(await run('inspect', packageDir, '--json')).toBe(0);

      const report = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(report).toMatchObject({
        status: 'parsed-valid',
        moduleType: 'aicc',
        valid: true,
        issues: [],
        metadata: { assignableUnitIds: ['A1', 'A2'], prerequisiteGraph: { A2: ['A1'] } }
      });
    });

    it('should fail an invalid package', async () => {
      fs.writeFileSync(path.join(packageDir, 'course.pre'), 'structure_element,prerequisite\nA2,A1 AND A9\n');

      expect(await run('inspect', packageDir)).toBe(1);

      expect(stdout()).toContain('🚫 INVALID: ');
      expect(stdout()).toContain("  ERROR [AICC_INVALID_AU_REFERENCE] Prerequisite for 'A2' references unknown assignable unit 'A9'");
      expect(new AuditLogger(logPath).read()[0]).toMatchObject({ status: 'parsed-with-errors', errorCount: 1 });
    });

    it('should fail an unrecognized directory', async () => {
      const empty = path.join(tempDir, 'empty');
      fs.mkdirSync(empty);

      expect(await run('inspect', empty)).toBe(1);

      expect(stderr()).toBe(`❌ Error: Unknown module type: no detector matched the package at ${path.resolve(empty)}`);
      expect(new AuditLogger(logPath).read()[0]).toMatchObject({ status: 'detection-failed' });
    });

    it('should refuse a path that is not a directory', async () => {
      const missing = path.join(tempDir, 'missing');

      expect(await run('inspect', missing)).toBe(1);

      expect(errorSpy).toHaveBeenCalledWith('Error:', `Not a directory: ${path.resolve(missing)}`);
    });

    it('should skip the audit log when disabled', async () => {
      config = { ...config, audit: { ...config.audit, enabled: false } };

      expect(await run('inspect', packageDir)).toBe(0);

      expect(fs.existsSync(logPath)).toBe(false);
    });
  });

  describe('detect', () => {
    it('should print the detected type', async () => {
      expect(await run('detect', packageDir)).toBe(0);

      expect(stdout()).toBe(`📦 ${path.resolve(packageDir)}: AICC (aicc)`);
    });

    it('should print JSON', async () => {
      expect(await run('detect', packageDir, '--json')).toBe(0);

      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
        rootPath: path.resolve(packageDir),
        moduleType: 'aicc'
      });
    });
  });

  describe('validate', () => {
    let treeFile: string;

    beforeEach(() => {
      treeFile = path.join(tempDir, 'tree.json');
      fs.writeFileSync(treeFile, JSON.stringify(SCORM_TREE));
    });

    it('should accept warnings by default', async () => {
      expect(await run('validate', treeFile)).toBe(0);

      expect(stdout().split('\n')[0]).toBe(`⚠️  VALID WITH WARNINGS: ${path.resolve(treeFile)}`);
    });

    it('should fail warnings under --strict or a strict config', async () => {
      expect(await run('validate', treeFile, '--strict')).toBe(1);

      config = { ...config, strict: true };
      expect(await run('validate', treeFile)).toBe(1);
    });

    it('should report a malformed tree', async () => {
      fs.writeFileSync(treeFile, '{"kind":"scorm3"}');

      expect(await run('validate', treeFile)).toBe(1);

      expect(String(errorSpy.mock.calls[0][1]).startsWith('Invalid manifest tree: kind: ')).toBe(true);
    });
  });

  describe('prereq', () => {
    it('should explain an expression', async () => {
      expect(await run('prereq', 'A1 & (A2 | *A3)')).toBe(0);

      expect(stdout()).toBe([
        'Expression: A1 & (A2 | *A3)',
        'Tokens: A1 AND ( A2 OR A3 )',
        'Postfix: A1 A2 A3 OR AND',
        'References: A1, A2, A3',
        'Optional: A3',
        'Mandatory: no'
      ].join('\n'));
    });

    it('should report a syntax error', async () => {
      expect(await run('prereq', '(A1')).toBe(1);

      expect(stderr()).toBe("❌ Error: Unmatched '(' at position 0");
    });
  });

  describe('log', () => {
    it('should list recorded inspections', async () => {
      await run('inspect', packageDir);
      await run('inspect', path.join(tempDir));
      logSpy.mockClear();

      expect(await run('log', '--status', 'parsed-valid')).toBe(0);

      const lines = stdout().split('\n');
      expect(lines).toHaveLength(1);
      expect(lines[0].endsWith(` parsed-valid aicc ${path.resolve(packageDir)} errors=0 warnings=0`)).toBe(true);
    });

    it('should print entries as JSON with a limit', async () => {
      await run('inspect', packageDir);
      await run('inspect', packageDir);
      logSpy.mockClear();

      expect(await run('log', '--json', '--limit', '1')).toBe(0);

      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toHaveLength(1);
    });

    it('should say when the log is empty', async () => {
      expect(await run('log')).toBe(0);

      expect(stdout()).toBe('No audit log entries.');
    });

    it('should validate its flags', async () => {
      expect(await run('log', '--limit', 'many')).toBe(1);
      expect(await run('log', '--status', 'great')).toBe(1);

      expect(errorSpy.mock.calls.map(call => call[1])).toEqual([
        '--limit requires a number',
        '--status must be one of: parsed-valid, parsed-with-warnings, parsed-with-errors, detection-failed, parse-failed'
      ]);
    });
  });
});
