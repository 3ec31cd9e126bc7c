/**
 * Stable issue codes. Consumers match on these strings; never rename them.
 */

export const IssueCodes = {
  // Package-wide
  DUPLICATE_IDENTIFIER: 'DUPLICATE_IDENTIFIER',
  ORPHANED_RESOURCE: 'ORPHANED_RESOURCE',

  // Path security
  UNSAFE_PATH_TRAVERSAL: 'UNSAFE_PATH_TRAVERSAL',
  UNSAFE_ABSOLUTE_PATH: 'UNSAFE_ABSOLUTE_PATH',
  UNSAFE_EXTERNAL_URL: 'UNSAFE_EXTERNAL_URL',
  UNSAFE_NULL_BYTE: 'UNSAFE_NULL_BYTE',

  // AICC
  AICC_MISSING_COURSE: 'AICC_MISSING_COURSE',
  AICC_MISSING_TITLE: 'AICC_MISSING_TITLE',
  AICC_MISSING_LAUNCH_URL: 'AICC_MISSING_LAUNCH_URL',
  AICC_DUPLICATE_AU_ID: 'AICC_DUPLICATE_AU_ID',
  AICC_INVALID_PREREQUISITE: 'AICC_INVALID_PREREQUISITE',
  AICC_INVALID_AU_REFERENCE: 'AICC_INVALID_AU_REFERENCE',

  // cmi5
  CMI5_MISSING_COURSE: 'CMI5_MISSING_COURSE',
  CMI5_MISSING_TITLE: 'CMI5_MISSING_TITLE',
  CMI5_MISSING_LAUNCH_URL: 'CMI5_MISSING_LAUNCH_URL',

  // xAPI
  XAPI_MISSING_ACTIVITIES: 'XAPI_MISSING_ACTIVITIES',
  XAPI_MISSING_LAUNCH_URL: 'XAPI_MISSING_LAUNCH_URL'
} as const;

/** SCORM 1.2 and SCORM 2004 share rule algorithms; only the prefix differs */
export type ContentPackagePrefix = 'SCORM12' | 'SCORM2004';

export function contentPackageCodes(prefix: ContentPackagePrefix) {
  return {
    MISSING_MANIFEST_ID: `${prefix}_MISSING_MANIFEST_ID`,
    MISSING_ORGANIZATIONS: `${prefix}_MISSING_ORGANIZATIONS`,
    NO_ORGANIZATIONS: `${prefix}_NO_ORGANIZATIONS`,
    INVALID_DEFAULT_ORG: `${prefix}_INVALID_DEFAULT_ORG`,
    DUPLICATE_ORG_ID: `${prefix}_DUPLICATE_ORG_ID`,
    DUPLICATE_ITEM_ID: `${prefix}_DUPLICATE_ITEM_ID`,
    MISSING_RESOURCE_REF: `${prefix}_MISSING_RESOURCE_REF`,
    MISSING_RESOURCES: `${prefix}_MISSING_RESOURCES`,
    DUPLICATE_RESOURCE_ID: `${prefix}_DUPLICATE_RESOURCE_ID`,
    MISSING_LAUNCH_URL: `${prefix}_MISSING_LAUNCH_URL`,
    NO_LAUNCHABLE_RESOURCES: `${prefix}_NO_LAUNCHABLE_RESOURCES`
  };
}

export type ContentPackageCodes = ReturnType<typeof contentPackageCodes>;
