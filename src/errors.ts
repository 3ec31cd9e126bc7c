/**
 * Error types for the detect → parse → validate pipeline.
 *
 * Validation problems are never thrown; they travel as ValidationIssue values.
 * These classes cover the hard failures that stop the pipeline.
 */

import type { ValidationResult } from './validation-result';

export class ModuleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unreadable directory, missing file, or any other I/O failure */
export class FileAccessError extends ModuleError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** No detector matched, or a detector itself failed */
export class ModuleDetectionError extends ModuleError {
  readonly rootPath: string;

  constructor(message: string, rootPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rootPath = rootPath;
  }
}

/** Malformed source document or missing top-level structure */
export class ManifestParseError extends ModuleError {
  readonly file?: string;

  constructor(message: string, file?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.file = file;
  }
}

/** Raised by strict-mode parsing when validation reports errors */
export class ModuleParsingError extends ModuleError {
  readonly validationResult: ValidationResult;

  constructor(contextMessage: string, result: ValidationResult) {
    super(`${contextMessage}:\n${result.formatErrors()}`);
    this.validationResult = result;
  }
}

/** Unbalanced parentheses or a dangling operator in a prerequisite expression */
export class PrerequisiteSyntaxError extends ModuleError {
  readonly expression: string;
  readonly position: number;

  constructor(message: string, expression: string, position: number) {
    super(message);
    this.expression = expression;
    this.position = position;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
