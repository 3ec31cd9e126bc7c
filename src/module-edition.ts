/**
 * SCORM 2004 edition detection
 */

import { ModuleEditionType, ModuleType } from './types';

/**
 * Derive the edition from free text such as a schemaversion
 * ("2004 4th Edition", "CAM 1.3"). Unknown or absent text is GENERIC.
 */
export function editionFromText(edition: string | null | undefined): ModuleEditionType {
  if (edition === null || edition === undefined) {
    return ModuleEditionType.GENERIC;
  }

  const normalized = edition.toLowerCase().trim();

  // Most specific first
  if (normalized.includes('4th')) {
    return ModuleEditionType.FOURTH;
  }
  if (normalized.includes('3rd')) {
    return ModuleEditionType.THIRD;
  }
  if (normalized.includes('2nd') || normalized === 'cam 1.3') {
    return ModuleEditionType.SECOND;
  }

  return ModuleEditionType.GENERIC;
}

/** Every edition projects back to SCORM 2004 */
export function editionToModuleType(edition: ModuleEditionType): ModuleType.SCORM_2004 {
  switch (edition) {
    case ModuleEditionType.GENERIC:
    case ModuleEditionType.SECOND:
    case ModuleEditionType.THIRD:
    case ModuleEditionType.FOURTH:
      return ModuleType.SCORM_2004;
  }
}

export function describeEdition(edition: ModuleEditionType): string {
  switch (edition) {
    case ModuleEditionType.GENERIC:
      return 'SCORM 2004';
    case ModuleEditionType.SECOND:
      return 'SCORM 2004 2nd Edition';
    case ModuleEditionType.THIRD:
      return 'SCORM 2004 3rd Edition';
    case ModuleEditionType.FOURTH:
      return 'SCORM 2004 4th Edition';
  }
}
