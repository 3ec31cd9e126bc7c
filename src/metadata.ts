/**
 * Metadata - Normalized summary of a parsed manifest
 *
 * Extraction is best-effort: it never throws on an invalid tree, it simply
 * reports what it can find.
 */

import { editionFromText } from './module-edition';
import { buildPrerequisiteGraph, parsePrerequisiteLenient } from './prerequisite-parser';
import {
  aiccLaunchUrl,
  cmi5AssignableUnits,
  cmi5LaunchUrl,
  contentPackageLaunchUrl,
  xapiLaunchUrl
} from './launch-url';
import { organizationsOf, ReferenceResolver, resourcesOf, walkAllItems } from './reference-resolver';
import {
  ModuleType,
  type AiccManifest,
  type AiccMetadata,
  type Cmi5Manifest,
  type Cmi5Metadata,
  type ContentPackageManifest,
  type ModuleMetadata,
  type PackageManifest,
  type Scorm12Metadata,
  type Scorm2004Manifest,
  type Scorm2004Metadata,
  type XapiManifest,
  type XapiMetadata
} from './types';

function nonNull(values: Array<string | null>): string[] {
  return values.filter((value): value is string => value !== null);
}

/** Manifest title, else the default (or first) organization's title */
function contentPackageTitle(manifest: ContentPackageManifest): string | null {
  if (manifest.title !== null) {
    return manifest.title;
  }
  const organization =
    new ReferenceResolver(manifest).defaultOrganization() ?? organizationsOf(manifest)[0];
  return organization?.title ?? null;
}

function contentPackageCounts(manifest: ContentPackageManifest) {
  const resources = resourcesOf(manifest);
  return {
    organizationCount: organizationsOf(manifest).length,
    resourceCount: resources.length,
    scoCount: resources.filter(resource => resource.scormType?.toLowerCase() === 'sco').length
  };
}

function scorm12Metadata(manifest: ContentPackageManifest): Scorm12Metadata {
  return {
    moduleType: ModuleType.SCORM_12,
    title: contentPackageTitle(manifest),
    description: manifest.description,
    identifier: manifest.identifier,
    version: manifest.version,
    launchUrl: contentPackageLaunchUrl(manifest),
    ...contentPackageCounts(manifest)
  };
}

/** An item with any sequencing data, even an empty object, opts in */
export function usesSequencing(manifest: ContentPackageManifest): boolean {
  for (const { item } of walkAllItems(manifest)) {
    if (item.sequencing !== null && item.sequencing !== undefined) {
      return true;
    }
  }
  return false;
}

function scorm2004Metadata(manifest: Scorm2004Manifest): Scorm2004Metadata {
  return {
    moduleType: ModuleType.SCORM_2004,
    title: contentPackageTitle(manifest),
    description: manifest.description,
    identifier: manifest.identifier,
    version: manifest.version,
    launchUrl: contentPackageLaunchUrl(manifest),
    edition: editionFromText(manifest.edition ?? manifest.metadata?.schemaVersion),
    usesSequencing: usesSequencing(manifest),
    ...contentPackageCounts(manifest)
  };
}

function aiccMetadata(manifest: AiccManifest): AiccMetadata {
  const prerequisites = manifest.prerequisites.map(entry =>
    parsePrerequisiteLenient(entry.structureElement, entry.prerequisite).prerequisite
  );

  return {
    moduleType: ModuleType.AICC,
    title: manifest.course?.title ?? null,
    description: manifest.course?.description ?? null,
    identifier: manifest.course?.courseId ?? null,
    version: manifest.course?.version ?? null,
    launchUrl: aiccLaunchUrl(manifest),
    assignableUnitIds: manifest.assignableUnits.map(unit => unit.systemId),
    prerequisites,
    prerequisiteGraph: buildPrerequisiteGraph(prerequisites)
  };
}

function cmi5Metadata(manifest: Cmi5Manifest): Cmi5Metadata {
  return {
    moduleType: ModuleType.CMI5,
    title: manifest.course?.title ?? null,
    description: manifest.course?.description ?? null,
    identifier: manifest.course?.id ?? null,
    version: null,
    launchUrl: cmi5LaunchUrl(manifest),
    assignableUnitIds: nonNull(cmi5AssignableUnits(manifest).map(unit => unit.id))
  };
}

/** The first activity stands for the package */
function xapiMetadata(manifest: XapiManifest): XapiMetadata {
  const first = manifest.activities[0];
  return {
    moduleType: ModuleType.XAPI,
    title: first?.name ?? null,
    description: first?.description ?? null,
    identifier: first?.id ?? null,
    version: null,
    launchUrl: xapiLaunchUrl(manifest),
    activityIds: nonNull(manifest.activities.map(activity => activity.id))
  };
}

export function extractMetadata(manifest: PackageManifest): ModuleMetadata {
  switch (manifest.kind) {
    case ModuleType.SCORM_12:
      return scorm12Metadata(manifest);
    case ModuleType.SCORM_2004:
      return scorm2004Metadata(manifest);
    case ModuleType.AICC:
      return aiccMetadata(manifest);
    case ModuleType.CMI5:
      return cmi5Metadata(manifest);
    case ModuleType.XAPI:
      return xapiMetadata(manifest);
  }
}
