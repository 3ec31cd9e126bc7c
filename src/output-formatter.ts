/**
 * OutputFormatter - Console output for coursepack
 *
 * Reports go to stdout; errors and warnings about the run itself go to
 * stderr. Issue severities are colored with ANSI escape codes when color
 * is enabled.
 */

import { describeEdition } from './module-edition';
import type { InspectionOutcome } from './module-inspector';
import {
  MODULE_TYPE_LABELS,
  ModuleType,
  Severity,
  type AiccPrerequisite,
  type LogEntry,
  type ModuleMetadata,
  type ValidationIssue
} from './types';
import type { ValidationResult } from './validation-result';

const ANSI = {
  red: '\u001b[31m',
  yellow: '\u001b[33m',
  green: '\u001b[32m',
  dim: '\u001b[2m',
  reset: '\u001b[0m'
} as const;

type Color = Exclude<keyof typeof ANSI, 'reset'>;

/**
 * JSON view of an inspection; failures carry the error name and message
 */
export function outcomeToJson(outcome: InspectionOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case 'parsed-valid':
    case 'parsed-with-warnings':
    case 'parsed-with-errors':
      return {
        status: outcome.status,
        rootPath: outcome.rootPath,
        moduleType: outcome.moduleType,
        metadata: outcome.metadata,
        ...outcome.result.toJSON()
      };
    case 'detection-failed':
      return {
        status: outcome.status,
        rootPath: outcome.rootPath,
        error: { name: outcome.error.name, message: outcome.error.message }
      };
    case 'parse-failed':
      return {
        status: outcome.status,
        rootPath: outcome.rootPath,
        moduleType: outcome.moduleType,
        error: { name: outcome.error.name, message: outcome.error.message }
      };
  }
}

function listOrNone(values: string[]): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

export class OutputFormatter {
  private colorEnabled: boolean;

  constructor(colorEnabled: boolean = true) {
    this.colorEnabled = colorEnabled;
  }

  /**
   * Display the report for one inspection. Metadata details beyond the
   * title and launch URL are shown only when verbose.
   */
  displayOutcome(outcome: InspectionOutcome, verbose: boolean = false): void {
    switch (outcome.status) {
      case 'detection-failed':
        this.displayError(outcome.error.message);
        return;
      case 'parse-failed':
        this.displayError(`${MODULE_TYPE_LABELS[outcome.moduleType]} package could not be parsed: ${outcome.error.message}`);
        return;
      case 'parsed-valid':
        console.log(this.paint('green', `✅ VALID: ${outcome.rootPath}`));
        break;
      case 'parsed-with-warnings':
        console.log(this.paint('yellow', `⚠️  VALID WITH WARNINGS: ${outcome.rootPath}`));
        break;
      case 'parsed-with-errors':
        console.log(this.paint('red', `🚫 INVALID: ${outcome.rootPath}`));
        break;
    }

    console.log(this.metadataLines(outcome.metadata, verbose).join('\n'));
    this.displayIssues(outcome.result);
  }

  /**
   * Display issues in report order, followed by a count summary
   */
  displayIssues(result: ValidationResult): void {
    if (result.issues.length === 0) {
      return;
    }

    const lines = [''];
    for (const issue of result.issues) {
      lines.push(...this.issueLines(issue));
    }
    lines.push('');
    lines.push(`${result.errors.length} error(s), ${result.warnings.length} warning(s)`);

    console.log(lines.join('\n'));
  }

  displayDetected(rootPath: string, moduleType: ModuleType): void {
    console.log(`📦 ${rootPath}: ${MODULE_TYPE_LABELS[moduleType]} (${moduleType})`);
  }

  displayPrerequisite(prerequisite: AiccPrerequisite): void {
    const lines = [
      `Expression: ${prerequisite.rawExpression ?? '(none)'}`,
      `Tokens: ${prerequisite.tokens.join(' ')}`,
      `Postfix: ${prerequisite.postfixTokens.join(' ')}`,
      `References: ${listOrNone(prerequisite.referencedAuIds)}`,
      `Optional: ${listOrNone(prerequisite.optionalAuIds)}`,
      `Mandatory: ${prerequisite.mandatory ? 'yes' : 'no'}`
    ];
    console.log(lines.join('\n'));
  }

  displayLogEntries(entries: LogEntry[]): void {
    if (entries.length === 0) {
      console.log('No audit log entries.');
      return;
    }

    for (const entry of entries) {
      const type = entry.moduleType ? ` ${entry.moduleType}` : '';
      const counts = `errors=${entry.errorCount} warnings=${entry.warningCount}`;
      const failure = entry.failure ? ` (${entry.failure})` : '';
      console.log(`${entry.timestamp} ${entry.status}${type} ${entry.rootPath} ${counts}${failure}`);
    }
  }

  displayJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  /**
   * Display error message
   */
  displayError(message: string): void {
    console.error(this.paint('red', `❌ Error: ${message}`));
  }

  /**
   * Display warning message
   */
  displayWarning(message: string): void {
    console.warn(this.paint('yellow', `⚠️  Warning: ${message}`));
  }

  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  private issueLines(issue: ValidationIssue): string[] {
    const label = issue.severity === Severity.ERROR
      ? this.paint('red', 'ERROR')
      : this.paint('yellow', 'WARNING');

    const lines = [`  ${label} [${issue.code}] ${issue.message}`];
    if (issue.location) {
      lines.push(this.paint('dim', `    at ${issue.location}`));
    }
    if (issue.suggestedFix) {
      lines.push(`    fix: ${issue.suggestedFix}`);
    }
    return lines;
  }

  private metadataLines(metadata: ModuleMetadata, verbose: boolean): string[] {
    const lines = [
      `Type: ${MODULE_TYPE_LABELS[metadata.moduleType]}`,
      `Title: ${metadata.title ?? '(untitled)'}`,
      `Launch: ${metadata.launchUrl ?? '(none)'}`
    ];

    if (!verbose) {
      return lines;
    }

    if (metadata.identifier !== null) {
      lines.push(`Identifier: ${metadata.identifier}`);
    }
    if (metadata.version !== null) {
      lines.push(`Version: ${metadata.version}`);
    }

    switch (metadata.moduleType) {
      case ModuleType.SCORM_12:
        lines.push(`Organizations: ${metadata.organizationCount}`);
        lines.push(`Resources: ${metadata.resourceCount} (${metadata.scoCount} SCO)`);
        break;
      case ModuleType.SCORM_2004:
        lines.push(`Edition: ${describeEdition(metadata.edition)}`);
        lines.push(`Organizations: ${metadata.organizationCount}`);
        lines.push(`Resources: ${metadata.resourceCount} (${metadata.scoCount} SCO)`);
        lines.push(`Sequencing: ${metadata.usesSequencing ? 'yes' : 'no'}`);
        break;
      case ModuleType.AICC:
        lines.push(`Assignable units: ${listOrNone(metadata.assignableUnitIds)}`);
        for (const [unit, dependencies] of Object.entries(metadata.prerequisiteGraph)) {
          lines.push(`  ${unit} <- ${listOrNone(dependencies)}`);
        }
        break;
      case ModuleType.CMI5:
        lines.push(`Assignable units: ${listOrNone(metadata.assignableUnitIds)}`);
        break;
      case ModuleType.XAPI:
        lines.push(`Activities: ${listOrNone(metadata.activityIds)}`);
        break;
    }

    return lines;
  }

  private paint(color: Color, text: string): string {
    return this.colorEnabled ? `${ANSI[color]}${text}${ANSI.reset}` : text;
  }
}
