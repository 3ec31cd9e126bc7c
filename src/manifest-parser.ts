/**
 * Manifest Parser - Contract for turning package files into a typed tree
 *
 * Only AICC ships with a built-in parser; SCORM, cmi5 and xAPI trees come
 * from XML and are supplied by the embedding application.
 */

import type { FileAccess } from './file-access';
import { AiccParser } from './aicc-parser';
import { MODULE_TYPE_LABELS, ModuleType, type ManifestOf } from './types';

export interface ModuleParser<M> {
  /** Throws ManifestParseError for malformed or structurally incomplete input */
  parse(fileAccess: FileAccess): M;
}

export type ParserRegistry = {
  [K in ModuleType]?: ModuleParser<ManifestOf<K>>;
};

export function defaultParsers(): ParserRegistry {
  return {
    [ModuleType.AICC]: new AiccParser()
  };
}

export function describeMissingParser(type: ModuleType): string {
  return `No parser registered for detected module type '${MODULE_TYPE_LABELS[type]}'`;
}
