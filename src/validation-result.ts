/**
 * Validation Result - Ordered, immutable collection of validation issues
 */

import { Severity, type ValidationIssue } from './types';

export function errorIssue(
  code: string,
  message: string,
  location: string,
  suggestedFix?: string
): ValidationIssue {
  return createIssue(Severity.ERROR, code, message, location, suggestedFix);
}

export function warningIssue(
  code: string,
  message: string,
  location: string,
  suggestedFix?: string
): ValidationIssue {
  return createIssue(Severity.WARNING, code, message, location, suggestedFix);
}

function createIssue(
  severity: Severity,
  code: string,
  message: string,
  location: string,
  suggestedFix?: string
): ValidationIssue {
  const issue: ValidationIssue = suggestedFix === undefined
    ? { code, severity, message, location }
    : { code, severity, message, location, suggestedFix };
  return Object.freeze(issue);
}

export class ValidationResult {
  readonly issues: readonly ValidationIssue[];

  private constructor(issues: readonly ValidationIssue[]) {
    this.issues = Object.freeze([...issues]);
  }

  static valid(): ValidationResult {
    return new ValidationResult([]);
  }

  static of(...issues: ValidationIssue[]): ValidationResult {
    return new ValidationResult(issues);
  }

  static fromIssues(issues: readonly ValidationIssue[]): ValidationResult {
    return new ValidationResult(issues);
  }

  /**
   * Concatenate issues; this result's issues come first
   */
  merge(other: ValidationResult): ValidationResult {
    return new ValidationResult([...this.issues, ...other.issues]);
  }

  /** Warnings never affect validity */
  get isValid(): boolean {
    return !this.hasErrors;
  }

  get hasErrors(): boolean {
    return this.issues.some(issue => issue.severity === Severity.ERROR);
  }

  get hasWarnings(): boolean {
    return this.issues.some(issue => issue.severity === Severity.WARNING);
  }

  get errors(): ValidationIssue[] {
    return this.issues.filter(issue => issue.severity === Severity.ERROR);
  }

  get warnings(): ValidationIssue[] {
    return this.issues.filter(issue => issue.severity === Severity.WARNING);
  }

  /**
   * Human-readable error summary used in exception messages
   */
  formatErrors(): string {
    const errors = this.errors;
    if (errors.length === 0) {
      return 'No errors';
    }

    const lines = [`${errors.length} error(s) found`];
    errors.forEach((issue, index) => {
      lines.push(`  ${index + 1}. [${issue.code}] ${issue.message}`);
      if (issue.location) {
        lines.push(`     Location: ${issue.location}`);
      }
      if (issue.suggestedFix) {
        lines.push(`     Suggestion: ${issue.suggestedFix}`);
      }
    });
    return lines.join('\n') + '\n';
  }

  toJSON(): { valid: boolean; issues: ValidationIssue[] } {
    return { valid: this.isValid, issues: [...this.issues] };
  }
}
