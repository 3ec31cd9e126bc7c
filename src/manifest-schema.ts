/**
 * Manifest Schema - Decodes serialized manifest trees (JSON) into typed
 * manifests
 *
 * This is the interchange format for trees produced by an external XML
 * deserializer. Omitted optional fields decode to null or [].
 */

import { z } from 'zod';
import { describeError, ManifestParseError } from './errors';
import {
  ModuleType,
  type Cmi5Block,
  type ContentItem,
  type PackageManifest
} from './types';

const nullableString = z.string().nullable().default(null);
const stringList = z.array(z.string()).default([]);

// ============================================================================
// Content packages
// ============================================================================

export const ContentItemSchema: z.ZodType<ContentItem, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    identifier: nullableString,
    identifierref: nullableString,
    title: nullableString,
    children: z.array(ContentItemSchema).default([]),
    sequencing: z.record(z.unknown()).nullable().optional()
  })
);

export const ContentOrganizationSchema = z.object({
  identifier: nullableString,
  title: nullableString,
  items: z.array(ContentItemSchema).default([])
});

export const ContentResourceSchema = z.object({
  identifier: nullableString,
  type: nullableString,
  scormType: nullableString,
  href: nullableString,
  files: stringList,
  dependencies: stringList
});

const contentPackageShape = {
  identifier: nullableString,
  version: nullableString,
  title: nullableString,
  description: nullableString,
  metadata: z.object({
    schema: nullableString,
    schemaVersion: nullableString
  }).nullable().default(null),
  organizations: z.object({
    defaultOrganization: nullableString,
    organizations: z.array(ContentOrganizationSchema).default([])
  }).nullable().default(null),
  resources: z.object({
    resources: z.array(ContentResourceSchema).default([])
  }).nullable().default(null)
};

export const Scorm12ManifestSchema = z.object({
  kind: z.literal(ModuleType.SCORM_12),
  ...contentPackageShape
});

export const Scorm2004ManifestSchema = z.object({
  kind: z.literal(ModuleType.SCORM_2004),
  ...contentPackageShape,
  edition: nullableString
});

// ============================================================================
// AICC
// ============================================================================

export const AiccManifestSchema = z.object({
  kind: z.literal(ModuleType.AICC),
  course: z.object({
    courseId: nullableString,
    title: nullableString,
    creator: nullableString,
    system: nullableString,
    level: nullableString,
    version: nullableString,
    totalAus: z.number().int().nonnegative().nullable().default(null),
    totalBlocks: z.number().int().nonnegative().nullable().default(null),
    description: nullableString
  }).nullable().default(null),
  assignableUnits: z.array(z.object({
    systemId: z.string().min(1),
    type: nullableString,
    commandLine: nullableString,
    fileName: nullableString,
    coreVendor: nullableString,
    webLaunch: nullableString,
    maxScore: nullableString,
    masteryScore: nullableString,
    maxTimeAllowed: nullableString,
    timeLimitAction: nullableString
  })).default([]),
  descriptors: z.array(z.object({
    systemId: z.string().min(1),
    developerId: nullableString,
    title: nullableString,
    description: nullableString
  })).default([]),
  courseStructure: z.array(z.object({
    block: z.string().min(1),
    members: stringList
  })).default([]),
  prerequisites: z.array(z.object({
    structureElement: z.string().min(1),
    prerequisite: nullableString
  })).default([])
});

// ============================================================================
// cmi5 / xAPI
// ============================================================================

export const Cmi5AssignableUnitSchema = z.object({
  id: nullableString,
  title: nullableString,
  description: nullableString,
  url: nullableString,
  launchMethod: nullableString,
  moveOn: nullableString,
  masteryScore: z.number().min(0).max(1).nullable().default(null)
});

export const Cmi5BlockSchema: z.ZodType<Cmi5Block, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    id: nullableString,
    title: nullableString,
    assignableUnits: z.array(Cmi5AssignableUnitSchema).default([]),
    blocks: z.array(Cmi5BlockSchema).default([])
  })
);

export const Cmi5ManifestSchema = z.object({
  kind: z.literal(ModuleType.CMI5),
  course: z.object({
    id: nullableString,
    title: nullableString,
    description: nullableString
  }).nullable().default(null),
  assignableUnits: z.array(Cmi5AssignableUnitSchema).default([]),
  blocks: z.array(Cmi5BlockSchema).default([])
});

export const XapiManifestSchema = z.object({
  kind: z.literal(ModuleType.XAPI),
  activities: z.array(z.object({
    id: nullableString,
    type: nullableString,
    name: nullableString,
    description: nullableString,
    launch: nullableString
  })).default([])
});

export const PackageManifestSchema = z.discriminatedUnion('kind', [
  Scorm12ManifestSchema,
  Scorm2004ManifestSchema,
  AiccManifestSchema,
  Cmi5ManifestSchema,
  XapiManifestSchema
]);

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decode an already-parsed value. Throws ManifestParseError on shape errors.
 */
export function decodeManifest(value: unknown, file?: string): PackageManifest {
  const result = PackageManifestSchema.safeParse(value);
  if (!result.success) {
    throw new ManifestParseError(`Invalid manifest tree: ${formatZodError(result.error)}`, file, {
      cause: result.error
    });
  }
  return result.data;
}

export function parseManifestJson(text: string, file?: string): PackageManifest {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ManifestParseError(`Malformed JSON: ${describeError(error)}`, file, { cause: error });
  }
  return decodeManifest(value, file);
}
