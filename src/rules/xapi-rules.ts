/**
 * xAPI / TinCan rules
 */

import { IssueCodes } from '../issue-codes';
import { xapiLaunchUrl } from '../launch-url';
import type { XapiManifest } from '../types';
import { errorIssue, ValidationResult } from '../validation-result';
import { defineRule, type ValidationRule } from './validation-rule';

type XapiRule = ValidationRule<XapiManifest>;

export function activitiesRequiredRule(): XapiRule {
  return defineRule<XapiManifest>('ActivitiesRequired', 'xAPI Specification - tincan.xml activities', manifest => {
    if (manifest.activities.length > 0) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      IssueCodes.XAPI_MISSING_ACTIVITIES,
      'xAPI manifest must contain at least one activity',
      'tincan.xml/activities'
    ));
  });
}

/** Skipped when there are no activities; that case has its own issue */
export function launchUrlRequiredRule(): XapiRule {
  return defineRule<XapiManifest>('LaunchUrlRequired', 'xAPI Specification - Activity Launch URL', manifest => {
    if (manifest.activities.length === 0 || xapiLaunchUrl(manifest) !== null) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      IssueCodes.XAPI_MISSING_LAUNCH_URL,
      'xAPI package must have a launch URL',
      'tincan.xml/activities/activity',
      'Ensure at least one activity has a launch attribute'
    ));
  });
}

export function xapiRules(): XapiRule[] {
  return [activitiesRequiredRule(), launchUrlRequiredRule()];
}
