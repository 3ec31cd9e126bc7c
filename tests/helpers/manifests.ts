/**
 * Manifest builders for tests. Every field defaults to a valid value.
 */

import {
  ModuleType,
  type AiccAssignableUnit,
  type AiccManifest,
  type Cmi5AssignableUnit,
  type Cmi5Manifest,
  type ContentItem,
  type ContentOrganization,
  type ContentResource,
  type Scorm12Manifest,
  type Scorm2004Manifest,
  type XapiManifest
} from '../../src/types';

export function item(
  identifier: string | null,
  identifierref: string | null = null,
  children: ContentItem[] = []
): ContentItem {
  return { identifier, identifierref, title: identifier, children };
}

export function organization(identifier: string | null, items: ContentItem[] = []): ContentOrganization {
  return { identifier, title: identifier === null ? null : `Organization ${identifier}`, items };
}

export function resource(
  identifier: string | null,
  href: string | null = 'index.html',
  files: string[] = []
): ContentResource {
  return { identifier, type: 'webcontent', scormType: 'sco', href, files, dependencies: [] };
}

/**
 * One organization ORG-1 with one item ITEM-1 launching RES-1 (index.html)
 */
export function scorm12Manifest(overrides: Partial<Omit<Scorm12Manifest, 'kind'>> = {}): Scorm12Manifest {
  return {
    kind: ModuleType.SCORM_12,
    identifier: 'MANIFEST-1',
    version: '1.0',
    title: null,
    description: null,
    metadata: { schema: 'ADL SCORM', schemaVersion: '1.2' },
    organizations: {
      defaultOrganization: 'ORG-1',
      organizations: [organization('ORG-1', [item('ITEM-1', 'RES-1')])]
    },
    resources: { resources: [resource('RES-1')] },
    ...overrides
  };
}

export function scorm2004Manifest(overrides: Partial<Omit<Scorm2004Manifest, 'kind'>> = {}): Scorm2004Manifest {
  return {
    ...scorm12Manifest(),
    metadata: { schema: 'ADL SCORM', schemaVersion: '2004 4th Edition' },
    edition: null,
    ...overrides,
    kind: ModuleType.SCORM_2004
  };
}

export function aiccManifest(overrides: Partial<Omit<AiccManifest, 'kind'>> = {}): AiccManifest {
  return {
    kind: ModuleType.AICC,
    course: {
      courseId: 'COURSE-1',
      title: 'Safety Basics',
      creator: 'Test Author',
      system: 'HTML',
      level: '1',
      version: '2.0',
      totalAus: 2,
      totalBlocks: 1,
      description: null
    },
    assignableUnits: [
      assignableUnit('A1', 'lesson1.html'),
      assignableUnit('A2', 'lesson2.html')
    ],
    descriptors: [],
    courseStructure: [{ block: 'root', members: ['A1', 'A2'] }],
    prerequisites: [],
    ...overrides
  };
}

export function assignableUnit(systemId: string, fileName: string | null = null): AiccAssignableUnit {
  return {
    systemId,
    type: 'lesson',
    commandLine: null,
    fileName,
    coreVendor: null,
    webLaunch: null,
    maxScore: null,
    masteryScore: null,
    maxTimeAllowed: null,
    timeLimitAction: null
  };
}

export function cmi5Unit(id: string | null, url: string | null = 'au/index.html'): Cmi5AssignableUnit {
  return { id, title: id, description: null, url, launchMethod: 'AnyWindow', moveOn: 'Completed', masteryScore: null };
}

export function cmi5Manifest(overrides: Partial<Omit<Cmi5Manifest, 'kind'>> = {}): Cmi5Manifest {
  return {
    kind: ModuleType.CMI5,
    course: { id: 'https://example.test/course/1', title: 'Onboarding', description: 'Intro course' },
    assignableUnits: [cmi5Unit('https://example.test/au/1')],
    blocks: [],
    ...overrides
  };
}

export function xapiManifest(overrides: Partial<Omit<XapiManifest, 'kind'>> = {}): XapiManifest {
  return {
    kind: ModuleType.XAPI,
    activities: [{
      id: 'https://example.test/activity/1',
      type: 'http://adlnet.gov/expapi/activities/course',
      name: 'Fire Drill',
      description: 'How to evacuate',
      launch: 'index.html'
    }],
    ...overrides
  };
}
