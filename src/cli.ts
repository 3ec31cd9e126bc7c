/**
 * CLI Interface - Main command-line interface
 */

import * as fs from 'fs';
import * as path from 'path';
import { AuditLogger } from './audit-logger';
import { ConfigLoader } from './config-loader';
import { describeError, ModuleDetectionError, PrerequisiteSyntaxError } from './errors';
import { LocalFileAccess } from './file-access';
import { parseManifestJson } from './manifest-schema';
import { ModuleInspector, type InspectionOutcome } from './module-inspector';
import { ModuleTypeDetector } from './module-type-detector';
import { OutputFormatter, outcomeToJson } from './output-formatter';
import { parsePrerequisite } from './prerequisite-parser';
import type { CLIOptions, InspectionStatus, InspectorConfig, LogEntry, LogReadOptions } from './types';

export const VERSION = '1.0.0';

const STATUSES: readonly InspectionStatus[] = [
  'parsed-valid',
  'parsed-with-warnings',
  'parsed-with-errors',
  'detection-failed',
  'parse-failed'
];

function isInspectionStatus(value: string): value is InspectionStatus {
  return STATUSES.some(status => status === value);
}

export interface CLIDependencies {
  /** Loaded from the config files when omitted */
  config?: InspectorConfig;
  logger?: AuditLogger;
  formatter?: OutputFormatter;
}

export class CLI {
  private readonly dependencies: CLIDependencies;

  constructor(dependencies: CLIDependencies = {}) {
    this.dependencies = dependencies;
  }

  /**
   * Main entry point for CLI
   *
   * Routes to a subcommand handler and returns the exit code:
   * 0 when the package (or expression) is acceptable, 1 otherwise.
   */
  async run(args: string[]): Promise<number> {
    try {
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`coursepack-inspector v${VERSION}`);
        return 0;
      }

      const [subcommand, ...rest] = args;
      const config = this.dependencies.config ?? new ConfigLoader().loadAll();

      switch (subcommand) {
        case 'inspect':
          return this.handleInspect(this.parseArgs(rest, config, 'inspect'), config);
        case 'detect':
          return this.handleDetect(this.parseArgs(rest, config, 'detect'), config);
        case 'validate':
          return await this.handleValidate(this.parseArgs(rest, config, 'validate'), config);
        case 'prereq':
          return this.handlePrereq(this.parseArgs(rest, config, 'prereq'), config);
        case 'log':
          return this.handleLog(rest, config);
        default:
          throw new Error(`Unknown command: ${subcommand}. Run "coursepack --help" for usage.`);
      }
    } catch (error) {
      console.error('Error:', describeError(error));
      return 1;
    }
  }

  /**
   * Parse flags and the single positional argument of a subcommand.
   * Config values are the defaults; flags only ever switch them on.
   */
  private parseArgs(args: string[], config: InspectorConfig, command: string): CLIOptions {
    const options: CLIOptions = {
      target: '',
      json: config.output.format === 'json',
      strict: config.strict,
      verbose: config.output.verbose
    };

    const positional: string[] = [];
    for (const arg of args) {
      if (arg === '--json') {
        options.json = true;
      } else if (arg === '--strict') {
        options.strict = true;
      } else if (arg === '--verbose') {
        options.verbose = true;
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else {
        positional.push(arg);
      }
    }

    if (positional.length !== 1) {
      throw new Error(`${command} requires exactly one argument. Run "coursepack --help" for usage.`);
    }
    options.target = positional[0];

    return options;
  }

  /**
   * Display usage information
   */
  private displayUsage(): void {
    console.log(`
coursepack - Detect and validate e-learning content packages

Usage:
  coursepack inspect <dir>            Detect, parse and validate a package
  coursepack detect <dir>             Print the detected package type
  coursepack validate <manifest.json> Validate a serialized manifest tree
  coursepack prereq "<expr>"          Parse an AICC prerequisite expression
  coursepack log                      View audit log

Flags:
  --json                              Print machine-readable JSON
  --strict                            Treat warnings as failures
  --verbose                           Show full package metadata

Log Flags:
  --limit <n>                         Show the last n entries (default: 50)
  --status <status>                   Only show entries with this outcome

Examples:
  coursepack inspect ./course         Inspect an unpacked package
  coursepack inspect ./course --json  Report as JSON
  coursepack prereq "A1 & (A2 | *A3)" Show tokens and postfix form
    `.trim());
  }

  private handleInspect(options: CLIOptions, config: InspectorConfig): number {
    const root = path.resolve(options.target);
    this.requireDirectory(root);

    const inspector = new ModuleInspector();
    const outcome = inspector.inspect(new LocalFileAccess(root));

    this.audit(outcome, config);
    return this.report(outcome, options, config);
  }

  private handleDetect(options: CLIOptions, config: InspectorConfig): number {
    const root = path.resolve(options.target);
    this.requireDirectory(root);

    const formatter = this.formatter(config);
    try {
      const moduleType = new ModuleTypeDetector().detect(new LocalFileAccess(root));
      if (options.json) {
        formatter.displayJson({ rootPath: root, moduleType });
      } else {
        formatter.displayDetected(root, moduleType);
      }
      return 0;
    } catch (error) {
      if (error instanceof ModuleDetectionError) {
        formatter.displayError(error.message);
        return 1;
      }
      throw error;
    }
  }

  /**
   * Validate a manifest tree serialized as JSON, as produced by an external
   * XML deserializer
   */
  private async handleValidate(options: CLIOptions, config: InspectorConfig): Promise<number> {
    const file = path.resolve(options.target);
    const text = await fs.promises.readFile(file, 'utf-8');
    const manifest = parseManifestJson(text, file);

    const outcome = new ModuleInspector().validateManifest(manifest, file);

    this.audit(outcome, config);
    return this.report(outcome, options, config);
  }

  private handlePrereq(options: CLIOptions, config: InspectorConfig): number {
    const formatter = this.formatter(config);
    try {
      const prerequisite = parsePrerequisite('expression', options.target);
      if (options.json) {
        formatter.displayJson(prerequisite);
      } else {
        formatter.displayPrerequisite(prerequisite);
      }
      return 0;
    } catch (error) {
      if (error instanceof PrerequisiteSyntaxError) {
        formatter.displayError(error.message);
        return 1;
      }
      throw error;
    }
  }

  private handleLog(args: string[], config: InspectorConfig): number {
    const readOptions: LogReadOptions = {};
    let json = config.output.format === 'json';

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--json') {
        json = true;
      } else if (arg === '--limit') {
        const value = args[++i];
        if (value === undefined || !/^\d+$/.test(value)) {
          throw new Error('--limit requires a number');
        }
        readOptions.limit = Number.parseInt(value, 10);
      } else if (arg === '--status') {
        const value = args[++i];
        if (value === undefined || !isInspectionStatus(value)) {
          throw new Error(`--status must be one of: ${STATUSES.join(', ')}`);
        }
        readOptions.status = value;
      } else {
        throw new Error(`Unknown flag: ${arg}`);
      }
    }

    const entries = this.logger(config).read(readOptions);
    const formatter = this.formatter(config);
    if (json) {
      formatter.displayJson(entries);
    } else {
      formatter.displayLogEntries(entries);
    }
    return 0;
  }

  private report(outcome: InspectionOutcome, options: CLIOptions, config: InspectorConfig): number {
    const formatter = this.formatter(config);
    if (options.json) {
      formatter.displayJson(outcomeToJson(outcome));
    } else {
      formatter.displayOutcome(outcome, options.verbose);
    }

    switch (outcome.status) {
      case 'parsed-valid':
        return 0;
      case 'parsed-with-warnings':
        return options.strict ? 1 : 0;
      case 'parsed-with-errors':
      case 'detection-failed':
      case 'parse-failed':
        return 1;
    }
  }

  private audit(outcome: InspectionOutcome, config: InspectorConfig): void {
    if (!config.audit.enabled) {
      return;
    }
    this.logger(config).log(CLI.toLogEntry(outcome));
  }

  static toLogEntry(outcome: InspectionOutcome): LogEntry {
    const timestamp = new Date().toISOString();

    switch (outcome.status) {
      case 'parsed-valid':
      case 'parsed-with-warnings':
      case 'parsed-with-errors':
        return {
          timestamp,
          rootPath: outcome.rootPath,
          status: outcome.status,
          moduleType: outcome.moduleType,
          errorCount: outcome.result.errors.length,
          warningCount: outcome.result.warnings.length
        };
      case 'detection-failed':
        return {
          timestamp,
          rootPath: outcome.rootPath,
          status: outcome.status,
          errorCount: 0,
          warningCount: 0,
          failure: outcome.error.message
        };
      case 'parse-failed':
        return {
          timestamp,
          rootPath: outcome.rootPath,
          status: outcome.status,
          moduleType: outcome.moduleType,
          errorCount: 0,
          warningCount: 0,
          failure: outcome.error.message
        };
    }
  }

  private requireDirectory(root: string): void {
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new Error(`Not a directory: ${root}`);
    }
  }

  private formatter(config: InspectorConfig): OutputFormatter {
    return this.dependencies.formatter ?? new OutputFormatter(config.output.color);
  }

  private logger(config: InspectorConfig): AuditLogger {
    return this.dependencies.logger ?? new AuditLogger(config.audit.path, config.audit.maxSize);
  }
}

// Run if called directly
if (require.main === module) {
  const cli = new CLI();
  cli.run(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
