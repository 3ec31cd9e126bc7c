/**
 * AICC Parser - Reads the course files of an AICC package
 *
 *   .crs  course description, INI sections ([Course], [Course_Description])
 *   .au   assignable units, CSV with a header row
 *   .des  descriptors, CSV
 *   .cst  course structure, CSV (block, member, member, ...)
 *   .pre  prerequisites, CSV (structure_element, prerequisite)
 *
 * Header names and INI keys are matched case-insensitively.
 */

import { AICC_EXTENSIONS, findRootFileByExtension } from './detector-plugins';
import { describeError, FileAccessError, ManifestParseError } from './errors';
import type { FileAccess } from './file-access';
import type { ModuleParser } from './manifest-parser';
import {
  ModuleType,
  type AiccAssignableUnit,
  type AiccCourse,
  type AiccDescriptor,
  type AiccManifest,
  type AiccPrerequisiteEntry,
  type AiccStructureBlock
} from './types';

export type IniDocument = Map<string, IniSection>;

export interface IniSection {
  values: Map<string, string>;
  /** Lines that are not key=value pairs, e.g. the [Course_Description] body */
  text: string[];
}

/** Header-keyed row; keys are lower-cased */
export type CsvRecord = Map<string, string>;

/**
 * Parse INI text. Section and key names are lower-cased; ';' starts a
 * comment line.
 */
export function parseIni(content: string): IniDocument {
  const document: IniDocument = new Map();
  let current: IniSection | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith(';')) {
      continue;
    }

    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      const name = header[1].trim().toLowerCase();
      current = document.get(name) ?? { values: new Map(), text: [] };
      document.set(name, current);
      continue;
    }

    if (current === null) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator > 0) {
      const key = line.slice(0, separator).trim().toLowerCase();
      current.values.set(key, unquote(line.slice(separator + 1).trim()));
    } else {
      current.text.push(line);
    }
  }

  return document;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Split CSV text into rows of fields. Quoted fields may contain commas,
 * newlines and doubled quotes. Unquoted fields are trimmed.
 */
export function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let wasQuoted = false;

  const endField = (): void => {
    row.push(wasQuoted ? field : field.trim());
    field = '';
    wasQuoted = false;
  };

  const endRow = (): void => {
    endField();
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
    } else if (char === '"' && field.trim() === '') {
      inQuotes = true;
      wasQuoted = true;
      field = '';
    } else if (char === ',') {
      endField();
    } else if (char === '\n') {
      endRow();
    } else if (char !== '\r' && !(wasQuoted && /\s/.test(char))) {
      field += char;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field');
  }
  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/** First row is the header; header names are lower-cased */
export function parseCsv(content: string): CsvRecord[] {
  const [header, ...rows] = parseCsvRows(content);
  if (header === undefined) {
    return [];
  }

  const names = header.map(name => name.trim().toLowerCase());
  return rows.map(row => {
    const record: CsvRecord = new Map();
    names.forEach((name, index) => {
      record.set(name, row[index] ?? '');
    });
    return record;
  });
}

function field(record: CsvRecord, name: string): string | null {
  const value = record.get(name);
  return value === undefined || value === '' ? null : value;
}

function integer(value: string | undefined): number | null {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

export class AiccParser implements ModuleParser<AiccManifest> {
  parse(fileAccess: FileAccess): AiccManifest {
    const courseFile = this.requireFile(fileAccess, AICC_EXTENSIONS.CRS);
    const auFile = this.requireFile(fileAccess, AICC_EXTENSIONS.AU);

    const course = this.parseCourse(parseIni(this.read(fileAccess, courseFile)));
    const assignableUnits = this.parseAssignableUnits(this.readCsv(fileAccess, auFile));

    const desFile = findRootFileByExtension(fileAccess, AICC_EXTENSIONS.DES);
    const cstFile = findRootFileByExtension(fileAccess, AICC_EXTENSIONS.CST);
    const preFile = findRootFileByExtension(fileAccess, AICC_EXTENSIONS.PRE);

    return {
      kind: ModuleType.AICC,
      course,
      assignableUnits,
      descriptors: desFile ? this.parseDescriptors(this.readCsv(fileAccess, desFile)) : [],
      courseStructure: cstFile ? this.parseCourseStructure(fileAccess, cstFile) : [],
      prerequisites: preFile ? this.parsePrerequisites(this.readCsv(fileAccess, preFile)) : []
    };
  }

  private requireFile(fileAccess: FileAccess, extension: string): string {
    const file = findRootFileByExtension(fileAccess, extension);
    if (file === null) {
      throw new ManifestParseError(`Required AICC file with extension ${extension} not found`);
    }
    return file;
  }

  private read(fileAccess: FileAccess, file: string): string {
    try {
      return fileAccess.getFileContents(file).toString('utf8');
    } catch (error) {
      if (error instanceof FileAccessError) {
        throw new ManifestParseError(`Cannot read ${file}: ${error.message}`, file, { cause: error });
      }
      throw error;
    }
  }

  private readCsv(fileAccess: FileAccess, file: string): CsvRecord[] {
    const content = this.read(fileAccess, file);
    try {
      return parseCsv(content);
    } catch (error) {
      throw new ManifestParseError(`Malformed CSV in ${file}: ${describeError(error)}`, file, { cause: error });
    }
  }

  /** No [Course] section means no course information at all */
  private parseCourse(ini: IniDocument): AiccCourse | null {
    const section = ini.get('course');
    if (section === undefined) {
      return null;
    }

    const value = (key: string): string | null => {
      const found = section.values.get(key);
      return found === undefined || found === '' ? null : found;
    };

    const descriptionLines = ini.get('course_description')?.text ?? [];

    return {
      courseId: value('course_id'),
      title: value('course_title'),
      creator: value('course_creator'),
      system: value('course_system'),
      level: value('level'),
      version: value('version'),
      totalAus: integer(section.values.get('total_aus')),
      totalBlocks: integer(section.values.get('total_blocks')),
      description: descriptionLines.length > 0 ? descriptionLines.join('\n') : null
    };
  }

  private parseAssignableUnits(records: CsvRecord[]): AiccAssignableUnit[] {
    const units: AiccAssignableUnit[] = [];
    for (const record of records) {
      const systemId = field(record, 'system_id');
      if (systemId === null) {
        continue;
      }
      units.push({
        systemId,
        type: field(record, 'type'),
        commandLine: field(record, 'command_line'),
        fileName: field(record, 'file_name'),
        coreVendor: field(record, 'core_vendor'),
        webLaunch: field(record, 'web_launch'),
        maxScore: field(record, 'max_score'),
        masteryScore: field(record, 'mastery_score'),
        maxTimeAllowed: field(record, 'max_time_allowed'),
        timeLimitAction: field(record, 'time_limit_action')
      });
    }
    return units;
  }

  private parseDescriptors(records: CsvRecord[]): AiccDescriptor[] {
    const descriptors: AiccDescriptor[] = [];
    for (const record of records) {
      const systemId = field(record, 'system_id');
      if (systemId === null) {
        continue;
      }
      descriptors.push({
        systemId,
        developerId: field(record, 'developer_id'),
        title: field(record, 'title'),
        description: field(record, 'description')
      });
    }
    return descriptors;
  }

  /** Column names repeat ("member", "member", ...), so read rows positionally */
  private parseCourseStructure(fileAccess: FileAccess, file: string): AiccStructureBlock[] {
    const content = this.read(fileAccess, file);
    let rows: string[][];
    try {
      rows = parseCsvRows(content);
    } catch (error) {
      throw new ManifestParseError(`Malformed CSV in ${file}: ${describeError(error)}`, file, { cause: error });
    }

    return rows.slice(1)
      .filter(row => row[0] !== undefined && row[0] !== '')
      .map(([block, ...members]) => ({
        block,
        members: members.filter(member => member !== '')
      }));
  }

  private parsePrerequisites(records: CsvRecord[]): AiccPrerequisiteEntry[] {
    const entries: AiccPrerequisiteEntry[] = [];
    for (const record of records) {
      const structureElement = field(record, 'structure_element');
      if (structureElement === null) {
        continue;
      }
      entries.push({ structureElement, prerequisite: field(record, 'prerequisite') });
    }
    return entries;
  }
}
