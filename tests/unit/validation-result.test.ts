/**
 * Unit tests for ValidationResult
 */

import { describe, it, expect } from 'vitest';
import { Severity } from '../../src/types';
import { errorIssue, ValidationResult, warningIssue } from '../../src/validation-result';

describe('ValidationResult', () => {
  describe('issue construction', () => {
    it('should freeze issues', () => {
      const issue = errorIssue('E1', 'Bad thing', 'here');

      expect(Object.isFrozen(issue)).toBe(true);
      expect(issue).toEqual({ code: 'E1', severity: Severity.ERROR, message: 'Bad thing', location: 'here' });
    });

    it('should omit suggestedFix when none is given', () => {
      expect('suggestedFix' in warningIssue('W1', 'Meh', 'there')).toBe(false);
      expect(warningIssue('W1', 'Meh', 'there', 'Tidy up').suggestedFix).toBe('Tidy up');
    });
  });

  describe('validity', () => {
    it('should be valid when empty', () => {
      const result = ValidationResult.valid();

      expect(result.isValid).toBe(true);
      expect(result.hasErrors).toBe(false);
      expect(result.hasWarnings).toBe(false);
      expect(result.issues).toEqual([]);
    });

    it('should stay valid with warnings only', () => {
      const result = ValidationResult.of(warningIssue('W1', 'Meh', 'there'));

      expect(result.isValid).toBe(true);
      expect(result.hasWarnings).toBe(true);
      expect(result.warnings).toHaveLength(1);
    });

    it('should be invalid with any error', () => {
      const result = ValidationResult.of(warningIssue('W1', 'Meh', 'there'), errorIssue('E1', 'Bad', 'here'));

      expect(result.isValid).toBe(false);
      expect(result.errors.map(issue => issue.code)).toEqual(['E1']);
      expect(result.warnings.map(issue => issue.code)).toEqual(['W1']);
    });
  });

  describe('merge()', () => {
    it('should keep the receiver issues first', () => {
      const first = ValidationResult.of(errorIssue('A', 'a', 'x'));
      const second = ValidationResult.of(errorIssue('B', 'b', 'y'), warningIssue('C', 'c', 'z'));

      const merged = first.merge(second);

      expect(merged.issues.map(issue => issue.code)).toEqual(['A', 'B', 'C']);
      expect(first.issues).toHaveLength(1);
      expect(second.issues).toHaveLength(2);
    });

    it('should not let callers mutate the issue list', () => {
      const result = ValidationResult.of(errorIssue('A', 'a', 'x'));

      expect(Object.isFrozen(result.issues)).toBe(true);
    });
  });

  describe('formatErrors()', () => {
    it('should report no errors', () => {
      expect(ValidationResult.of(warningIssue('W1', 'Meh', 'there')).formatErrors()).toBe('No errors');
    });

    it('should number errors with location and suggestion', () => {
      const result = ValidationResult.of(
        errorIssue('E1', 'Bad thing', 'here', 'Fix it'),
        warningIssue('W1', 'Meh', 'there'),
        errorIssue('E2', 'Worse thing', '')
      );

      expect(result.formatErrors()).toBe(
        '2 error(s) found\n' +
        '  1. [E1] Bad thing\n' +
        '     Location: here\n' +
        '     Suggestion: Fix it\n' +
        '  2. [E2] Worse thing\n'
      );
    });
  });

  it('should serialize to JSON with validity and issues', () => {
    const result = ValidationResult.of(warningIssue('W1', 'Meh', 'there'));

    expect(JSON.parse(JSON.stringify(result))).toEqual({
      valid: true,
      issues: [{ code: 'W1', severity: 'warning', message: 'Meh', location: 'there' }]
    });
  });
});
