/**
 * Module Inspector - Main detect → parse → validate orchestrator
 */

import { FileAccessError, ManifestParseError, ModuleDetectionError, ModuleParsingError } from './errors';
import type { FileAccess } from './file-access';
import { defaultParsers, describeMissingParser, type ModuleParser, type ParserRegistry } from './manifest-parser';
import { extractMetadata } from './metadata';
import { ModuleTypeDetector } from './module-type-detector';
import { ModuleType, type ModuleMetadata, type PackageManifest } from './types';
import { ValidationEngine } from './validation-engine';
import type { ValidationResult } from './validation-result';

interface ParsedFields {
  rootPath: string;
  moduleType: ModuleType;
  manifest: PackageManifest;
  metadata: ModuleMetadata;
  result: ValidationResult;
}

export type ParsedOutcome =
  | ({ status: 'parsed-valid' } & ParsedFields)
  | ({ status: 'parsed-with-warnings' } & ParsedFields)
  | ({ status: 'parsed-with-errors' } & ParsedFields);

export type InspectionOutcome =
  | ParsedOutcome
  | { status: 'detection-failed'; rootPath: string; error: ModuleDetectionError }
  | { status: 'parse-failed'; rootPath: string; moduleType: ModuleType; error: ManifestParseError | FileAccessError };

export interface ModuleInspectorOptions {
  detector?: ModuleTypeDetector;
  /** Merged over the built-in parsers */
  parsers?: ParserRegistry;
  engine?: ValidationEngine;
  /** parse() throws ModuleParsingError when validation reports errors */
  strict?: boolean;
}

export class ModuleInspector {
  private readonly detector: ModuleTypeDetector;
  private readonly parsers: ParserRegistry;
  private readonly engine: ValidationEngine;
  private readonly strict: boolean;

  constructor(options: ModuleInspectorOptions = {}) {
    this.detector = options.detector ?? new ModuleTypeDetector();
    this.parsers = { ...defaultParsers(), ...options.parsers };
    this.engine = options.engine ?? new ValidationEngine();
    this.strict = options.strict ?? false;
  }

  /**
   * Run the whole pipeline and report where it ended. Detection and parse
   * failures become outcomes; programmer errors still throw.
   */
  inspect(fileAccess: FileAccess): InspectionOutcome {
    const rootPath = fileAccess.getRootPath();

    let moduleType: ModuleType;
    try {
      moduleType = this.detector.detect(fileAccess);
    } catch (error) {
      if (error instanceof ModuleDetectionError) {
        return { status: 'detection-failed', rootPath, error };
      }
      throw error;
    }

    let manifest: PackageManifest;
    try {
      manifest = this.parseManifest(moduleType, fileAccess);
    } catch (error) {
      if (error instanceof ManifestParseError || error instanceof FileAccessError) {
        return { status: 'parse-failed', rootPath, moduleType, error };
      }
      throw error;
    }

    return this.validateParsed(rootPath, moduleType, manifest);
  }

  /**
   * Like inspect(), but hard failures throw. In strict mode a result with
   * errors throws ModuleParsingError as well.
   */
  parse(fileAccess: FileAccess): ParsedOutcome {
    const outcome = this.inspect(fileAccess);

    switch (outcome.status) {
      case 'detection-failed':
      case 'parse-failed':
        throw outcome.error;
      case 'parsed-with-errors':
        if (this.strict) {
          throw new ModuleParsingError(`Validation failed for module at ${outcome.rootPath}`, outcome.result);
        }
        return outcome;
      case 'parsed-valid':
      case 'parsed-with-warnings':
        return outcome;
    }
  }

  /** Validate a tree that was parsed elsewhere */
  validateManifest(manifest: PackageManifest, rootPath: string = manifest.kind): ParsedOutcome {
    return this.validateParsed(rootPath, manifest.kind, manifest);
  }

  private validateParsed(rootPath: string, moduleType: ModuleType, manifest: PackageManifest): ParsedOutcome {
    const result = this.engine.validate(manifest);
    const fields: ParsedFields = {
      rootPath,
      moduleType,
      manifest,
      metadata: extractMetadata(manifest),
      result
    };

    if (result.hasErrors) {
      return { status: 'parsed-with-errors', ...fields };
    }
    if (result.hasWarnings) {
      return { status: 'parsed-with-warnings', ...fields };
    }
    return { status: 'parsed-valid', ...fields };
  }

  private parseManifest(type: ModuleType, fileAccess: FileAccess): PackageManifest {
    switch (type) {
      case ModuleType.SCORM_12:
        return this.requireParser(this.parsers[ModuleType.SCORM_12], type).parse(fileAccess);
      case ModuleType.SCORM_2004:
        return this.requireParser(this.parsers[ModuleType.SCORM_2004], type).parse(fileAccess);
      case ModuleType.AICC:
        return this.requireParser(this.parsers[ModuleType.AICC], type).parse(fileAccess);
      case ModuleType.CMI5:
        return this.requireParser(this.parsers[ModuleType.CMI5], type).parse(fileAccess);
      case ModuleType.XAPI:
        return this.requireParser(this.parsers[ModuleType.XAPI], type).parse(fileAccess);
    }
  }

  private requireParser<M>(parser: ModuleParser<M> | undefined, type: ModuleType): ModuleParser<M> {
    if (parser === undefined) {
      throw new ManifestParseError(describeMissingParser(type));
    }
    return parser;
  }
}
