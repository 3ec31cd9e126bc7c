/**
 * Validation Rule - One checkable property of a manifest
 */

import type { ValidationResult } from '../validation-result';

export interface ValidationRule<M> {
  /** Human-readable rule name */
  readonly name: string;
  /** Section of the governing specification the rule enforces */
  readonly specReference: string;
  /**
   * Pure check. Invalid data yields Error/Warning issues; only a missing
   * manifest throws.
   */
  validate(manifest: M | null | undefined): ValidationResult;
}

/**
 * Build a rule from a check function, adding the null-manifest guard every
 * rule shares.
 */
export function defineRule<M>(
  name: string,
  specReference: string,
  check: (manifest: M) => ValidationResult
): ValidationRule<M> {
  return {
    name,
    specReference,
    validate(manifest: M | null | undefined): ValidationResult {
      return check(requireManifest(manifest));
    }
  };
}

export function requireManifest<M>(manifest: M | null | undefined): M {
  if (manifest === null || manifest === undefined) {
    throw new TypeError('manifest must not be null');
  }
  return manifest;
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}
