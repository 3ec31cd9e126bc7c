/**
 * Core type definitions for coursepack-inspector
 */

// ============================================================================
// Module Types
// ============================================================================

export enum ModuleType {
  SCORM_12 = 'scorm12',
  SCORM_2004 = 'scorm2004',
  AICC = 'aicc',
  CMI5 = 'cmi5',
  XAPI = 'xapi'
}

export const MODULE_TYPE_LABELS: Record<ModuleType, string> = {
  [ModuleType.SCORM_12]: 'SCORM 1.2',
  [ModuleType.SCORM_2004]: 'SCORM 2004',
  [ModuleType.AICC]: 'AICC',
  [ModuleType.CMI5]: 'cmi5',
  [ModuleType.XAPI]: 'xAPI/TinCan'
};

export enum ModuleEditionType {
  GENERIC = 'generic',
  SECOND = '2nd',
  THIRD = '3rd',
  FOURTH = '4th'
}

// ============================================================================
// Content Package Tree (SCORM 1.2 / SCORM 2004)
// ============================================================================

/**
 * Absence is `null`; an empty string is a present-but-empty value and several
 * rules treat the two differently.
 */
export interface ContentItem {
  identifier: string | null;
  identifierref: string | null;
  title: string | null;
  children: ContentItem[];
  /** SCORM 2004 only. Consumed as data, never executed. */
  sequencing?: Record<string, unknown> | null;
}

export interface ContentOrganization {
  identifier: string | null;
  title: string | null;
  items: ContentItem[];
}

export interface ContentOrganizations {
  defaultOrganization: string | null;
  organizations: ContentOrganization[];
}

export interface ContentResource {
  identifier: string | null;
  type: string | null;
  /** adlcp:scormtype / adlcp:scormType */
  scormType: string | null;
  href: string | null;
  files: string[];
  dependencies: string[];
}

export interface ContentResources {
  resources: ContentResource[];
}

export interface ContentPackageMetadata {
  schema: string | null;
  schemaVersion: string | null;
}

export interface ContentPackageManifest {
  identifier: string | null;
  version: string | null;
  title: string | null;
  description: string | null;
  metadata: ContentPackageMetadata | null;
  organizations: ContentOrganizations | null;
  resources: ContentResources | null;
}

export interface Scorm12Manifest extends ContentPackageManifest {
  kind: ModuleType.SCORM_12;
}

export interface Scorm2004Manifest extends ContentPackageManifest {
  kind: ModuleType.SCORM_2004;
  /** Free-text edition, usually the schemaversion ("2004 4th Edition", "CAM 1.3") */
  edition: string | null;
}

// ============================================================================
// AICC
// ============================================================================

export interface AiccCourse {
  courseId: string | null;
  title: string | null;
  creator: string | null;
  system: string | null;
  level: string | null;
  version: string | null;
  totalAus: number | null;
  totalBlocks: number | null;
  description: string | null;
}

export interface AiccAssignableUnit {
  systemId: string;
  type: string | null;
  commandLine: string | null;
  fileName: string | null;
  coreVendor: string | null;
  webLaunch: string | null;
  maxScore: string | null;
  masteryScore: string | null;
  maxTimeAllowed: string | null;
  timeLimitAction: string | null;
}

export interface AiccDescriptor {
  systemId: string;
  developerId: string | null;
  title: string | null;
  description: string | null;
}

export interface AiccStructureBlock {
  block: string;
  members: string[];
}

export interface AiccPrerequisiteEntry {
  structureElement: string;
  prerequisite: string | null;
}

export interface AiccManifest {
  kind: ModuleType.AICC;
  course: AiccCourse | null;
  assignableUnits: AiccAssignableUnit[];
  descriptors: AiccDescriptor[];
  courseStructure: AiccStructureBlock[];
  prerequisites: AiccPrerequisiteEntry[];
}

// ============================================================================
// cmi5
// ============================================================================

export interface Cmi5AssignableUnit {
  id: string | null;
  title: string | null;
  description: string | null;
  url: string | null;
  launchMethod: string | null;
  moveOn: string | null;
  masteryScore: number | null;
}

/**
 * AUs and nested blocks are kept in separate lists, so their relative order
 * inside the block is not recorded.
 */
export interface Cmi5Block {
  id: string | null;
  title: string | null;
  assignableUnits: Cmi5AssignableUnit[];
  blocks: Cmi5Block[];
}

export interface Cmi5Course {
  id: string | null;
  title: string | null;
  description: string | null;
}

export interface Cmi5Manifest {
  kind: ModuleType.CMI5;
  course: Cmi5Course | null;
  /** AUs directly under courseStructure; their order relative to blocks is not kept */
  assignableUnits: Cmi5AssignableUnit[];
  blocks: Cmi5Block[];
}

// ============================================================================
// xAPI / TinCan
// ============================================================================

export interface XapiActivity {
  id: string | null;
  type: string | null;
  name: string | null;
  description: string | null;
  launch: string | null;
}

export interface XapiManifest {
  kind: ModuleType.XAPI;
  activities: XapiActivity[];
}

export type PackageManifest =
  | Scorm12Manifest
  | Scorm2004Manifest
  | AiccManifest
  | Cmi5Manifest
  | XapiManifest;

/** Manifest type for a given module type */
export type ManifestOf<T extends ModuleType> = Extract<PackageManifest, { kind: T }>;

// ============================================================================
// Validation Types
// ============================================================================

export enum Severity {
  ERROR = 'error',
  WARNING = 'warning'
}

export interface ValidationIssue {
  readonly code: string;
  readonly severity: Severity;
  readonly message: string;
  /** Path-like locator, e.g. resources/resource[@identifier='x'] */
  readonly location: string;
  readonly suggestedFix?: string;
}

// ============================================================================
// AICC Prerequisite Types
// ============================================================================

export type PrerequisiteOperator = 'AND' | 'OR' | 'NOT';

export interface PrerequisiteToken {
  type: 'operand' | 'operator' | 'lparen' | 'rparen';
  value: string;
  /** Operand was marked optional with a leading '*' */
  optional: boolean;
  position: number;
}

export interface AiccPrerequisite {
  assignableUnitId: string;
  rawExpression: string | null;
  mandatory: boolean;
  tokens: string[];
  postfixTokens: string[];
  referencedAuIds: string[];
  optionalAuIds: string[];
}

/** AU id -> ids it depends on, first-seen order */
export type PrerequisiteGraph = Record<string, string[]>;

// ============================================================================
// Metadata Types
// ============================================================================

interface BaseModuleMetadata {
  title: string | null;
  description: string | null;
  identifier: string | null;
  version: string | null;
  launchUrl: string | null;
}

export interface Scorm12Metadata extends BaseModuleMetadata {
  moduleType: ModuleType.SCORM_12;
  organizationCount: number;
  resourceCount: number;
  scoCount: number;
}

export interface Scorm2004Metadata extends BaseModuleMetadata {
  moduleType: ModuleType.SCORM_2004;
  edition: ModuleEditionType;
  organizationCount: number;
  resourceCount: number;
  scoCount: number;
  usesSequencing: boolean;
}

export interface AiccMetadata extends BaseModuleMetadata {
  moduleType: ModuleType.AICC;
  assignableUnitIds: string[];
  prerequisites: AiccPrerequisite[];
  prerequisiteGraph: PrerequisiteGraph;
}

export interface Cmi5Metadata extends BaseModuleMetadata {
  moduleType: ModuleType.CMI5;
  assignableUnitIds: string[];
}

export interface XapiMetadata extends BaseModuleMetadata {
  moduleType: ModuleType.XAPI;
  activityIds: string[];
}

export type ModuleMetadata =
  | Scorm12Metadata
  | Scorm2004Metadata
  | AiccMetadata
  | Cmi5Metadata
  | XapiMetadata;

// ============================================================================
// Configuration Types
// ============================================================================

export enum ConfigSource {
  GLOBAL = 'global',    // /etc/coursepack/config
  USER = 'user',        // ~/.config/coursepack/config
  PROJECT = 'project'   // ./.coursepackrc
}

export type OutputFormat = 'text' | 'json';

export interface InspectorConfig {
  strict: boolean;
  audit: {
    enabled: boolean;
    path: string;
    maxSize: number;
  };
  output: {
    format: OutputFormat;
    color: boolean;
    verbose: boolean;
  };
}

export interface ConfigError {
  line: number;
  message: string;
  source: ConfigSource;
}

export interface ConfigLoadResult {
  values: Partial<Record<ConfigKey, string>>;
  errors: ConfigError[];
}

export type ConfigKey =
  | 'strict'
  | 'audit.enabled'
  | 'audit.path'
  | 'audit.max_size'
  | 'output.format'
  | 'output.color'
  | 'output.verbose';

// ============================================================================
// Audit Logging Types
// ============================================================================

export type InspectionStatus =
  | 'parsed-valid'
  | 'parsed-with-warnings'
  | 'parsed-with-errors'
  | 'detection-failed'
  | 'parse-failed';

export interface LogEntry {
  timestamp: string;      // ISO 8601
  rootPath: string;
  status: InspectionStatus;
  moduleType?: ModuleType;
  errorCount: number;
  warningCount: number;
  failure?: string;
}

export interface LogReadOptions {
  limit?: number;         // Default: 50
  status?: InspectionStatus;
  since?: Date;
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  /** Package directory, manifest file or prerequisite expression */
  target: string;
  json: boolean;
  /** Warnings fail the run as well as errors */
  strict: boolean;
  verbose: boolean;
}
