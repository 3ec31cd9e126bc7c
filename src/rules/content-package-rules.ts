/**
 * Content package rules (SCORM 1.2 and SCORM 2004)
 *
 * Both dialects share one tree shape, so every rule is built from a factory
 * that only varies the issue-code prefix and the CAM section cited.
 */

import { IdentifierRegistry } from '../identifier-registry';
import { contentPackageCodes, IssueCodes, type ContentPackagePrefix } from '../issue-codes';
import { checkPathSafety } from '../path-security';
import {
  organizationsOf,
  ReferenceResolver,
  resourcesOf,
  walkAllItems
} from '../reference-resolver';
import type { ContentItem, ContentOrganization, ContentPackageManifest, ValidationIssue } from '../types';
import { errorIssue, ValidationResult, warningIssue } from '../validation-result';
import { defineRule, isBlank, type ValidationRule } from './validation-rule';

type ContentRule = ValidationRule<ContentPackageManifest>;

const CAM_LABELS: Record<ContentPackagePrefix, string> = {
  SCORM12: 'SCORM 1.2 CAM',
  SCORM2004: 'SCORM 2004 CAM'
};

// ============================================================================
// Locations
// ============================================================================

export function organizationLocation(organization: ContentOrganization): string {
  return `organizations/organization[@identifier='${organization.identifier ?? ''}']`;
}

export function itemLocation(organization: ContentOrganization, item: ContentItem): string {
  return `${organizationLocation(organization)}/item[@identifier='${item.identifier ?? ''}']`;
}

export function resourceLocation(identifier: string | null): string {
  return `resources/resource[@identifier='${identifier ?? ''}']`;
}

function duplicatesToIssues(
  registry: IdentifierRegistry,
  code: string,
  describe: (identifier: string, count: number) => string,
  fix: (locations: string) => string
): ValidationResult {
  const issues = registry.duplicates().map(duplicate => {
    const locations = duplicate.locations.join(', ');
    return errorIssue(code, describe(duplicate.identifier, duplicate.count), locations, fix(locations));
  });
  return ValidationResult.fromIssues(issues);
}

// ============================================================================
// Package-wide rules
// ============================================================================

/**
 * Identifiers share one namespace across manifest, organizations, items and
 * resources
 */
export function duplicateIdentifierRule(prefix: ContentPackagePrefix): ContentRule {
  return defineRule<ContentPackageManifest>('Duplicate Identifier Validation', `${CAM_LABELS[prefix]} 2.3.1`, manifest => {
    const registry = new IdentifierRegistry();

    registry.register(manifest.identifier, 'manifest/@identifier');
    for (const organization of organizationsOf(manifest)) {
      registry.register(organization.identifier, organizationLocation(organization));
    }
    for (const { item, organization } of walkAllItems(manifest)) {
      registry.register(item.identifier, itemLocation(organization, item));
    }
    for (const resource of resourcesOf(manifest)) {
      registry.register(resource.identifier, resourceLocation(resource.identifier));
    }

    return duplicatesToIssues(
      registry,
      IssueCodes.DUPLICATE_IDENTIFIER,
      (identifier, count) => `Identifier '${identifier}' is used ${count} times but must be unique`,
      locations => `Rename duplicate identifiers to be unique. Locations: ${locations}`
    );
  });
}

export function pathSecurityRule(): ContentRule {
  return defineRule<ContentPackageManifest>('Path Security Validation', 'Security Best Practice', manifest => {
    const issues: ValidationIssue[] = [];

    const check = (path: string, location: string): void => {
      const violation = checkPathSafety(path);
      if (violation) {
        issues.push(errorIssue(violation.code, violation.message, location, violation.suggestedFix));
      }
    };

    for (const resource of resourcesOf(manifest)) {
      const base = resourceLocation(resource.identifier);
      if (resource.href !== null) {
        check(resource.href, `${base}/@href`);
      }
      for (const file of resource.files) {
        check(file, `${base}/file/@href`);
      }
    }

    return ValidationResult.fromIssues(issues);
  });
}

export function orphanedResourcesRule(): ContentRule {
  return defineRule<ContentPackageManifest>('Orphaned Resources Detection', 'Best Practice', manifest => {
    const referenced = new ReferenceResolver(manifest).referencedResourceIds();

    const issues = resourcesOf(manifest)
      .filter(resource => resource.identifier !== null && !referenced.has(resource.identifier))
      .map(resource => warningIssue(
        IssueCodes.ORPHANED_RESOURCE,
        `Resource '${resource.identifier ?? ''}' is not referenced by any item`,
        resourceLocation(resource.identifier),
        'Either reference this resource from an item or remove it to reduce package size'
      ));

    return ValidationResult.fromIssues(issues);
  });
}

// ============================================================================
// Structural rules
// ============================================================================

export function manifestIdentifierRequiredRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Manifest Identifier Required', `${CAM_LABELS[prefix]} 2.3.1`, manifest => {
    if (!isBlank(manifest.identifier)) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      codes.MISSING_MANIFEST_ID,
      'Manifest must have a non-empty identifier attribute',
      'manifest/@identifier',
      'Add a unique identifier attribute to the <manifest> element'
    ));
  });
}

export function resourcesRequiredRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Resources Element Required', `${CAM_LABELS[prefix]} 2.3.4`, manifest => {
    if (manifest.resources !== null) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      codes.MISSING_RESOURCES,
      'Manifest must contain a <resources> element',
      'manifest',
      'Add a <resources> element to the manifest'
    ));
  });
}

export function organizationsRequiredRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Organizations Element Required', `${CAM_LABELS[prefix]} 2.3.2`, manifest => {
    if (manifest.organizations !== null) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      codes.MISSING_ORGANIZATIONS,
      'Manifest must contain an <organizations> element',
      'manifest'
    ));
  });
}

/** Absent <organizations> is reported by organizationsRequiredRule instead */
export function organizationCardinalityRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Organization Cardinality', `${CAM_LABELS[prefix]} 2.3.2`, manifest => {
    if (manifest.organizations === null || manifest.organizations.organizations.length > 0) {
      return ValidationResult.valid();
    }
    return ValidationResult.of(errorIssue(
      codes.NO_ORGANIZATIONS,
      'The <organizations> element must contain at least one <organization>',
      'organizations',
      'Add an <organization> element describing the course structure'
    ));
  });
}

export function defaultOrganizationValidRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Default Organization Validity', `${CAM_LABELS[prefix]} 2.3.2`, manifest => {
    const organizations = manifest.organizations;
    // No default specified is valid; an empty one is a dangling reference
    if (organizations === null || organizations.defaultOrganization === null) {
      return ValidationResult.valid();
    }

    const defaultId = organizations.defaultOrganization;
    const resolver = new ReferenceResolver(manifest);
    if (defaultId !== '' && resolver.hasOrganization(defaultId)) {
      return ValidationResult.valid();
    }

    return ValidationResult.of(errorIssue(
      codes.INVALID_DEFAULT_ORG,
      `Default organization '${defaultId}' not found`,
      'organizations/@default',
      'Ensure the default attribute references a valid organization identifier'
    ));
  });
}

// ============================================================================
// Uniqueness rules
// ============================================================================

export function uniqueOrganizationIdRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Unique Organization Identifiers', `${CAM_LABELS[prefix]} 2.3.2`, manifest => {
    const registry = new IdentifierRegistry();
    for (const organization of organizationsOf(manifest)) {
      registry.register(organization.identifier, organizationLocation(organization));
    }
    return duplicatesToIssues(
      registry,
      codes.DUPLICATE_ORG_ID,
      (identifier, count) => `Organization identifier '${identifier}' is declared ${count} times`,
      () => 'Give every organization a unique identifier'
    );
  });
}

export function uniqueItemIdRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Unique Item Identifiers', `${CAM_LABELS[prefix]} 2.3.3`, manifest => {
    const registry = new IdentifierRegistry();
    for (const { item, organization } of walkAllItems(manifest)) {
      registry.register(item.identifier, itemLocation(organization, item));
    }
    return duplicatesToIssues(
      registry,
      codes.DUPLICATE_ITEM_ID,
      (identifier, count) => `Item identifier '${identifier}' is declared ${count} times`,
      () => 'Give every item a unique identifier, including nested items'
    );
  });
}

export function uniqueResourceIdRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Unique Resource Identifiers', `${CAM_LABELS[prefix]} 2.3.4`, manifest => {
    const registry = new IdentifierRegistry();
    for (const resource of resourcesOf(manifest)) {
      registry.register(resource.identifier, resourceLocation(resource.identifier));
    }
    return duplicatesToIssues(
      registry,
      codes.DUPLICATE_RESOURCE_ID,
      (identifier, count) => `Resource identifier '${identifier}' is declared ${count} times`,
      () => 'Give every resource a unique identifier'
    );
  });
}

// ============================================================================
// Launch and reference rules
// ============================================================================

/** A missing <resources> element is reported by resourcesRequiredRule */
export function launchableResourceRequiredRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Launchable Resource Required', `${CAM_LABELS[prefix]} 2.3.3`, manifest => {
    if (manifest.resources === null) {
      return ValidationResult.valid();
    }

    const launchable = manifest.resources.resources.some(resource => !isBlank(resource.href));
    if (launchable) {
      return ValidationResult.valid();
    }

    return ValidationResult.of(errorIssue(
      codes.NO_LAUNCHABLE_RESOURCES,
      'Package has no launchable resources',
      'resources',
      'Add an href attribute to at least one resource so the package can be launched'
    ));
  });
}

/**
 * Absent identifierref marks a container item. An empty one is a reference
 * to nothing.
 */
export function resourceReferenceValidRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Resource Reference Validity', `${CAM_LABELS[prefix]} 2.3.3`, manifest => {
    const resolver = new ReferenceResolver(manifest);
    const issues: ValidationIssue[] = [];

    for (const { item, organization } of walkAllItems(manifest)) {
      const ref = item.identifierref;
      if (ref === null || (ref !== '' && resolver.hasResource(ref))) {
        continue;
      }
      issues.push(errorIssue(
        codes.MISSING_RESOURCE_REF,
        `Item references non-existent resource '${ref}'`,
        `organization[@identifier='${organization.identifier ?? ''}']/item[@identifier='${item.identifier ?? ''}']/@identifierref`,
        'Ensure the identifierref attribute references a valid resource identifier'
      ));
    }

    return ValidationResult.fromIssues(issues);
  });
}

/** Reported once per resource, however many items reference it */
export function referencedResourceHrefRule(prefix: ContentPackagePrefix): ContentRule {
  const codes = contentPackageCodes(prefix);
  return defineRule<ContentPackageManifest>('Resource Href Required', `${CAM_LABELS[prefix]} 2.3.4`, manifest => {
    const resolver = new ReferenceResolver(manifest);
    const reported = new Set<string>();
    const issues: ValidationIssue[] = [];

    for (const { item } of walkAllItems(manifest)) {
      const ref = item.identifierref;
      if (ref === null || ref === '' || reported.has(ref)) {
        continue;
      }
      const resource = resolver.resolveResource(ref);
      if (resource === undefined || !isBlank(resource.href)) {
        continue;
      }
      reported.add(ref);
      issues.push(errorIssue(
        codes.MISSING_LAUNCH_URL,
        `Resource '${ref}' is missing href attribute (launch URL)`,
        `resource[@identifier='${ref}']/@href`,
        "Add an href attribute pointing to the SCO's launch file"
      ));
    }

    return ValidationResult.fromIssues(issues);
  });
}

/**
 * Full rule list in execution order
 */
export function contentPackageRules(prefix: ContentPackagePrefix): ContentRule[] {
  return [
    duplicateIdentifierRule(prefix),
    pathSecurityRule(),
    orphanedResourcesRule(),
    manifestIdentifierRequiredRule(prefix),
    resourcesRequiredRule(prefix),
    organizationsRequiredRule(prefix),
    organizationCardinalityRule(prefix),
    defaultOrganizationValidRule(prefix),
    uniqueOrganizationIdRule(prefix),
    uniqueItemIdRule(prefix),
    uniqueResourceIdRule(prefix),
    launchableResourceRequiredRule(prefix),
    resourceReferenceValidRule(prefix),
    referencedResourceHrefRule(prefix)
  ];
}
