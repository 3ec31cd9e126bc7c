#!/usr/bin/env node
/**
 * coursepack-inspector - Main entry point
 */

import { CLI } from './cli';
import { enforceNodeVersion } from './version-checker';

export async function main(args: string[]): Promise<number> {
  // Check Node.js version before proceeding
  enforceNodeVersion();

  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

export * from './types';
export * from './errors';
export { ValidationResult, errorIssue, warningIssue } from './validation-result';
export { IssueCodes, contentPackageCodes } from './issue-codes';
export { editionFromText, editionToModuleType, describeEdition } from './module-edition';
export { checkPathSafety, isSafePath, normalizeForInspection } from './path-security';
export type { PathViolation, PathViolationCode } from './path-security';
export { IdentifierRegistry } from './identifier-registry';
export type { DuplicateIdentifier } from './identifier-registry';
export { ReferenceResolver, walkItems, walkAllItems } from './reference-resolver';
export {
  tokenize,
  toPostfix,
  extractDependencies,
  parsePrerequisite,
  parsePrerequisiteLenient,
  buildPrerequisiteGraph
} from './prerequisite-parser';
export { defineRule } from './rules/validation-rule';
export type { ValidationRule } from './rules/validation-rule';
export { contentPackageRules } from './rules/content-package-rules';
export { aiccRules } from './rules/aicc-rules';
export { cmi5Rules } from './rules/cmi5-rules';
export { xapiRules } from './rules/xapi-rules';
export { ValidationEngine, defaultRuleTable } from './validation-engine';
export type { RuleTable } from './validation-engine';
export { LocalFileAccess, InMemoryFileAccess } from './file-access';
export type { FileAccess } from './file-access';
export {
  ScormDetectorPlugin,
  Cmi5DetectorPlugin,
  AiccDetectorPlugin,
  XapiDetectorPlugin,
  defaultDetectorPlugins
} from './detector-plugins';
export type { ModuleTypeDetectorPlugin } from './detector-plugins';
export { ModuleTypeDetector } from './module-type-detector';
export { defaultParsers } from './manifest-parser';
export type { ModuleParser, ParserRegistry } from './manifest-parser';
export { AiccParser } from './aicc-parser';
export { decodeManifest, parseManifestJson, PackageManifestSchema } from './manifest-schema';
export { extractMetadata } from './metadata';
export { ModuleInspector } from './module-inspector';
export type { InspectionOutcome, ParsedOutcome, ModuleInspectorOptions } from './module-inspector';
export { AuditLogger } from './audit-logger';
export { ConfigLoader, DEFAULT_CONFIG } from './config-loader';
export { OutputFormatter, outcomeToJson } from './output-formatter';
export { CLI } from './cli';
export { checkNodeVersion, compareVersions, enforceNodeVersion } from './version-checker';
