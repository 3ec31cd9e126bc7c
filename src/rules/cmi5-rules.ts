/**
 * cmi5 rules
 */

import { IssueCodes } from '../issue-codes';
import { cmi5LaunchUrl } from '../launch-url';
import type { Cmi5Manifest } from '../types';
import { errorIssue, ValidationResult } from '../validation-result';
import { defineRule, type ValidationRule } from './validation-rule';

type Cmi5Rule = ValidationRule<Cmi5Manifest>;

export function courseRequiredRule(): Cmi5Rule {
  return defineRule<Cmi5Manifest>('CourseRequired', 'cmi5 Specification - Course Structure', manifest => {
    if (manifest.course !== null) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      IssueCodes.CMI5_MISSING_COURSE,
      'cmi5 manifest must contain course element',
      'cmi5.xml/course'
    ));
  });
}

// Only an absent or empty title counts; whitespace is a title
export function titleRequiredRule(): Cmi5Rule {
  return defineRule<Cmi5Manifest>(
    'TitleRequired',
    'cmi5 Specification - Course Structure - title element',
    manifest => {
      const title = manifest.course?.title;
      if (title !== null && title !== undefined && title !== '') {
        return ValidationResult.valid();
      }
      return ValidationResult.of(errorIssue(
        IssueCodes.CMI5_MISSING_TITLE,
        'cmi5 course must have a title',
        'cmi5.xml/course/title',
        'Add a <title> element to the course'
      ));
    }
  );
}

export function launchUrlRequiredRule(): Cmi5Rule {
  return defineRule<Cmi5Manifest>(
    'LaunchUrlRequired',
    'cmi5 Specification - Assignable Unit - url attribute',
    manifest => {
      if (cmi5LaunchUrl(manifest) !== null) {
        return ValidationResult.valid();
      }
      return ValidationResult.of(errorIssue(
        IssueCodes.CMI5_MISSING_LAUNCH_URL,
        'cmi5 course must have at least one AU with a launch URL',
        'cmi5.xml/course/au',
        'Ensure at least one AU has a url attribute'
      ));
    }
  );
}

export function cmi5Rules(): Cmi5Rule[] {
  return [courseRequiredRule(), titleRequiredRule(), launchUrlRequiredRule()];
}
