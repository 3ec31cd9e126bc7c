/**
 * AICC rules
 */

import { IdentifierRegistry } from '../identifier-registry';
import { IssueCodes } from '../issue-codes';
import { aiccLaunchUrl } from '../launch-url';
import { parsePrerequisiteLenient } from '../prerequisite-parser';
import type { AiccManifest, ValidationIssue } from '../types';
import { errorIssue, ValidationResult } from '../validation-result';
import { defineRule, isBlank, type ValidationRule } from './validation-rule';

type AiccRule = ValidationRule<AiccManifest>;

const GUIDELINES = 'AICC CMI Guidelines';

function prerequisiteLocation(structureElement: string): string {
  return `course.pre[@structure_element='${structureElement}']`;
}

/** Assignable unit ids plus block names from the course structure */
export function knownStructureElements(manifest: AiccManifest): Set<string> {
  const known = new Set<string>();
  for (const unit of manifest.assignableUnits) {
    known.add(unit.systemId);
  }
  for (const block of manifest.courseStructure) {
    known.add(block.block);
  }
  return known;
}

export function courseRequiredRule(): AiccRule {
  return defineRule<AiccManifest>('CourseRequired', `${GUIDELINES} - Course Structure File (.crs)`, manifest => {
    if (manifest.course !== null) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      IssueCodes.AICC_MISSING_COURSE,
      'AICC manifest must contain course information',
      'course.crs'
    ));
  });
}

export function titleRequiredRule(): AiccRule {
  return defineRule<AiccManifest>(
    'TitleRequired',
    `${GUIDELINES} - Course Structure File (.crs) - course_title field`,
    manifest => {
      if (!isBlank(manifest.course?.title)) {
        return ValidationResult.valid();
      }
      return ValidationResult.of(errorIssue(
        IssueCodes.AICC_MISSING_TITLE,
        'AICC course must have a title',
        'course.crs',
        'Add a course_title field to the .crs file'
      ));
    }
  );
}

export function launchUrlRequiredRule(): AiccRule {
  return defineRule<AiccManifest>(
    'LaunchUrlRequired',
    `${GUIDELINES} - Assignable Unit File (.au) - file_name field`,
    manifest => {
      if (aiccLaunchUrl(manifest) !== null) {
        return ValidationResult.valid();
      }
      return ValidationResult.of(errorIssue(
        IssueCodes.AICC_MISSING_LAUNCH_URL,
        'AICC course must have a launch URL',
        'assignable_unit',
        'Give the root assignable unit (first member of the ROOT block in the .cst file) a file_name'
      ));
    }
  );
}

export function uniqueAssignableUnitIdRule(): AiccRule {
  return defineRule<AiccManifest>(
    'UniqueAssignableUnitIds',
    `${GUIDELINES} - Assignable Unit File (.au) - system_id field`,
    manifest => {
      const registry = new IdentifierRegistry();
      manifest.assignableUnits.forEach((unit, index) => {
        registry.register(unit.systemId, `course.au[${index + 1}]`);
      });

      const issues = registry.duplicates().map(duplicate => errorIssue(
        IssueCodes.AICC_DUPLICATE_AU_ID,
        `Assignable unit '${duplicate.identifier}' is declared ${duplicate.count} times`,
        duplicate.locations.join(', '),
        'Give every assignable unit a unique system_id'
      ));
      return ValidationResult.fromIssues(issues);
    }
  );
}

export function prerequisiteSyntaxRule(): AiccRule {
  return defineRule<AiccManifest>(
    'PrerequisiteSyntax',
    `${GUIDELINES} - Prerequisites File (.pre)`,
    manifest => {
      const issues: ValidationIssue[] = [];

      for (const entry of manifest.prerequisites) {
        const { error } = parsePrerequisiteLenient(entry.structureElement, entry.prerequisite);
        if (error) {
          issues.push(errorIssue(
            IssueCodes.AICC_INVALID_PREREQUISITE,
            `Prerequisite for '${entry.structureElement}' is malformed: ${error.message}`,
            prerequisiteLocation(entry.structureElement),
            'Balance parentheses and join identifiers with AND or OR'
          ));
        }
      }

      return ValidationResult.fromIssues(issues);
    }
  );
}

/**
 * Every prerequisite owner, prerequisite operand and structure member must be
 * a declared assignable unit or block
 */
export function assignableUnitReferenceRule(): AiccRule {
  return defineRule<AiccManifest>(
    'AssignableUnitReferences',
    `${GUIDELINES} - Course Structure (.cst) and Prerequisites (.pre)`,
    manifest => {
      const known = knownStructureElements(manifest);
      const issues: ValidationIssue[] = [];

      const unknown = (message: string, location: string): ValidationIssue => errorIssue(
        IssueCodes.AICC_INVALID_AU_REFERENCE,
        message,
        location,
        'Reference an assignable unit or block declared in the .au or .cst file'
      );

      for (const block of manifest.courseStructure) {
        for (const member of block.members) {
          if (!known.has(member)) {
            issues.push(unknown(
              `Course structure block '${block.block}' references unknown assignable unit '${member}'`,
              `course.cst[@block='${block.block}']`
            ));
          }
        }
      }

      for (const entry of manifest.prerequisites) {
        const location = prerequisiteLocation(entry.structureElement);
        if (!known.has(entry.structureElement)) {
          issues.push(unknown(
            `Prerequisite declared for unknown assignable unit '${entry.structureElement}'`,
            location
          ));
        }

        const { prerequisite } = parsePrerequisiteLenient(entry.structureElement, entry.prerequisite);
        for (const id of prerequisite.referencedAuIds) {
          if (!known.has(id)) {
            issues.push(unknown(
              `Prerequisite for '${entry.structureElement}' references unknown assignable unit '${id}'`,
              location
            ));
          }
        }
      }

      return ValidationResult.fromIssues(issues);
    }
  );
}

export function aiccRules(): AiccRule[] {
  return [
    courseRequiredRule(),
    titleRequiredRule(),
    launchUrlRequiredRule(),
    uniqueAssignableUnitIdRule(),
    prerequisiteSyntaxRule(),
    assignableUnitReferenceRule()
  ];
}
