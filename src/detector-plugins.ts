/**
 * Detector Plugins - One sniffer per package format
 */

import { describeError, ModuleDetectionError } from './errors';
import { rootFiles, type FileAccess } from './file-access';
import { ModuleType } from './types';

export interface ModuleTypeDetectorPlugin {
  readonly name: string;
  /** Higher runs first */
  readonly priority: number;
  /** The detected type, or null when the package is not this format */
  detect(fileAccess: FileAccess): ModuleType | null;
}

export const MANIFEST_FILES = {
  SCORM: 'imsmanifest.xml',
  CMI5: 'cmi5.xml',
  XAPI: 'tincan.xml'
} as const;

export const AICC_EXTENSIONS = {
  AU: '.au',
  CRS: '.crs',
  DES: '.des',
  CST: '.cst',
  PRE: '.pre'
} as const;

/** Root-level file matching a name case-insensitively */
export function findRootFile(fileAccess: FileAccess, fileName: string): string | null {
  const wanted = fileName.toLowerCase();
  return rootFiles(fileAccess).find(file => file.toLowerCase() === wanted) ?? null;
}

/** Root-level file with an extension, case-insensitively */
export function findRootFileByExtension(fileAccess: FileAccess, extension: string): string | null {
  const wanted = extension.toLowerCase();
  return rootFiles(fileAccess).find(file => file.toLowerCase().endsWith(wanted)) ?? null;
}

/**
 * Run a sniffer, turning any failure into a detection error so that an I/O
 * problem is never mistaken for "not this format"
 */
function sniff(
  fileAccess: FileAccess,
  failure: string,
  body: () => ModuleType | null
): ModuleType | null {
  try {
    return body();
  } catch (error) {
    if (error instanceof ModuleDetectionError) {
      throw error;
    }
    throw new ModuleDetectionError(
      `${failure}: ${describeError(error)}`,
      fileAccess.getRootPath(),
      { cause: error }
    );
  }
}

// ============================================================================
// SCORM version sniffing
// ============================================================================

const SCHEMA_PATTERN = /<(?:[\w.-]+:)?schema\s*>\s*([^<]*?)\s*<\//i;
const SCHEMA_VERSION_PATTERN = /<(?:[\w.-]+:)?schemaversion\s*>\s*([^<]*?)\s*<\//i;
const ADLCP_NAMESPACE_PATTERN = /xmlns:adlcp\s*=\s*["']([^"']*)["']/i;
const NON_ELEMENT_MARKUP = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>/gi;
const FIRST_START_TAG = /<[A-Za-z_][^>]*>/;

/**
 * Decide between SCORM 1.2 and SCORM 2004 from manifest text. Comments,
 * CDATA sections and processing instructions are ignored, and the adlcp
 * namespace is read from the root element only.
 *
 * An "ADL SCORM" schema with version 1.2 or 2004* decides directly; otherwise
 * an adlcp_v1p3 / adlcp_v1p2 namespace means 2004. Anything else is 1.2.
 */
export function detectScormVersion(manifestXml: string): ModuleType.SCORM_12 | ModuleType.SCORM_2004 {
  const markup = manifestXml.replace(NON_ELEMENT_MARKUP, '');
  const schema = SCHEMA_PATTERN.exec(markup)?.[1];
  const version = SCHEMA_VERSION_PATTERN.exec(markup)?.[1];

  if (schema !== undefined && version !== undefined && schema.toLowerCase() === 'adl scorm') {
    if (version.toLowerCase() === '1.2') {
      return ModuleType.SCORM_12;
    }
    if (version.startsWith('2004')) {
      return ModuleType.SCORM_2004;
    }
  }

  const rootTag = FIRST_START_TAG.exec(markup)?.[0] ?? '';
  const namespace = ADLCP_NAMESPACE_PATTERN.exec(rootTag)?.[1] ?? '';
  if (namespace.includes('adlcp_v1p3') || namespace.includes('adlcp_v1p2')) {
    return ModuleType.SCORM_2004;
  }

  return ModuleType.SCORM_12;
}

// ============================================================================
// Plugins
// ============================================================================

export class ScormDetectorPlugin implements ModuleTypeDetectorPlugin {
  readonly name = 'SCORM Detector';
  readonly priority = 100;

  detect(fileAccess: FileAccess): ModuleType | null {
    return sniff(fileAccess, 'Error detecting SCORM module', () => {
      const manifest = findRootFile(fileAccess, MANIFEST_FILES.SCORM);
      if (manifest === null) {
        return null;
      }
      return detectScormVersion(fileAccess.getFileContents(manifest).toString('utf8'));
    });
  }
}

export class Cmi5DetectorPlugin implements ModuleTypeDetectorPlugin {
  readonly name = 'cmi5 Detector';
  readonly priority = 90;

  detect(fileAccess: FileAccess): ModuleType | null {
    return sniff(fileAccess, 'Error detecting cmi5 module', () =>
      findRootFile(fileAccess, MANIFEST_FILES.CMI5) === null ? null : ModuleType.CMI5
    );
  }
}

/** Needs both an assignable unit file and a course file */
export class AiccDetectorPlugin implements ModuleTypeDetectorPlugin {
  readonly name = 'AICC Detector';
  readonly priority = 80;

  detect(fileAccess: FileAccess): ModuleType | null {
    return sniff(fileAccess, 'Error detecting AICC module', () => {
      const hasAu = findRootFileByExtension(fileAccess, AICC_EXTENSIONS.AU) !== null;
      const hasCrs = findRootFileByExtension(fileAccess, AICC_EXTENSIONS.CRS) !== null;
      return hasAu && hasCrs ? ModuleType.AICC : null;
    });
  }
}

export class XapiDetectorPlugin implements ModuleTypeDetectorPlugin {
  readonly name = 'xAPI/TinCan Detector';
  readonly priority = 40;

  detect(fileAccess: FileAccess): ModuleType | null {
    return sniff(fileAccess, 'Error detecting xAPI module', () =>
      findRootFile(fileAccess, MANIFEST_FILES.XAPI) === null ? null : ModuleType.XAPI
    );
  }
}

export function defaultDetectorPlugins(): ModuleTypeDetectorPlugin[] {
  return [
    new ScormDetectorPlugin(),
    new Cmi5DetectorPlugin(),
    new AiccDetectorPlugin(),
    new XapiDetectorPlugin()
  ];
}
