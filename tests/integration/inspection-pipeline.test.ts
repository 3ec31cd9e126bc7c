/**
 * Integration tests for detect → parse → validate on packages on disk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LocalFileAccess } from '../../src/file-access';
import type { ModuleParser } from '../../src/manifest-parser';
import { decodeManifest } from '../../src/manifest-schema';
import { ModuleInspector } from '../../src/module-inspector';
import { IssueCodes } from '../../src/issue-codes';
import { ModuleEditionType, ModuleType, type Scorm2004Manifest } from '../../src/types';

/**
 * Stand-in for an XML deserializer: reads a JSON tree stored next to the
 * manifest
 */
const sidecarParser: ModuleParser<Scorm2004Manifest> = {
  parse(fileAccess) {
    const tree = decodeManifest(JSON.parse(fileAccess.getFileContents('manifest-tree.json').toString('utf8')));
    if (tree.kind !== ModuleType.SCORM_2004) {
      throw new Error(`Expected a SCORM 2004 tree, got ${tree.kind}`);
    }
    return tree;
  }
};

const MANIFEST_XML = `<?xml version="1.0"?>
<manifest identifier="M1">
  <metadata><schema>ADL SCORM</schema><schemaversion>2004 3rd Edition</schemaversion></metadata>
</manifest>`;

describe('inspection pipeline', () => {
  let packageDir: string;

  const write = (file: string, content: string): void => {
    const target = path.join(packageDir, file);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  };

  beforeEach(() => {
    packageDir = fs.mkdtempSync(path.join(os.tmpdir(), 'coursepack-pipeline-'));
  });

  afterEach(() => {
    if (fs.existsSync(packageDir)) {
      fs.rmSync(packageDir, { recursive: true, force: true });
    }
  });

  it('should inspect a SCORM 2004 package through a registered parser', () => {
    write('imsmanifest.xml', MANIFEST_XML);
    write('manifest-tree.json', JSON.stringify({
      kind: 'scorm2004',
      identifier: 'M1',
      title: 'Forklift Operation',
      metadata: { schema: 'ADL SCORM', schemaVersion: '2004 3rd Edition' },
      organizations: {
        defaultOrganization: 'O1',
        organizations: [{
          identifier: 'O1',
          items: [{ identifier: 'I1', identifierref: 'R1', sequencing: { controlMode: { flow: true } } }]
        }]
      },
      resources: {
        resources: [{ identifier: 'R1', href: 'sco/start.html', scormType: 'sco', files: ['sco/start.html'] }]
      }
    }));

    const inspector = new ModuleInspector({ parsers: { [ModuleType.SCORM_2004]: sidecarParser } });
    const outcome = inspector.inspect(new LocalFileAccess(packageDir));

    expect(outcome.status).toBe('parsed-valid');
    if (outcome.status === 'parsed-valid' && outcome.metadata.moduleType === ModuleType.SCORM_2004) {
      expect(outcome.metadata.title).toBe('Forklift Operation');
      expect(outcome.metadata.edition).toBe(ModuleEditionType.THIRD);
      expect(outcome.metadata.usesSequencing).toBe(true);
      expect(outcome.metadata.launchUrl).toBe('sco/start.html');
    }
  });

  it('should report unsafe file paths found in the tree', () => {
    write('imsmanifest.xml', MANIFEST_XML);
    write('manifest-tree.json', JSON.stringify({
      kind: 'scorm2004',
      identifier: 'M1',
      organizations: {
        defaultOrganization: 'O1',
        organizations: [{ identifier: 'O1', items: [{ identifier: 'I1', identifierref: 'R1' }] }]
      },
      resources: {
        resources: [{ identifier: 'R1', href: 'start.html', files: ['%2e%2e/secrets.txt'] }]
      }
    }));

    const inspector = new ModuleInspector({ parsers: { [ModuleType.SCORM_2004]: sidecarParser } });
    const outcome = inspector.inspect(new LocalFileAccess(packageDir));

    expect(outcome.status).toBe('parsed-with-errors');
    if (outcome.status === 'parsed-with-errors') {
      expect(outcome.result.issues.map(issue => issue.code)).toEqual([IssueCodes.UNSAFE_PATH_TRAVERSAL]);
    }
  });

  it('should parse an AICC package with upper-case file names', () => {
    write('COURSE.CRS', '[COURSE]\r\nCOURSE_ID=C7\r\nCOURSE_TITLE=Hazard Signs\r\n');
    write('COURSE.AU', '"SYSTEM_ID","FILE_NAME"\r\n"A1","signs/index.html"\r\n');
    write('COURSE.CST', '"BLOCK","MEMBER"\r\n"ROOT","A1"\r\n');
    write('extras/notes.txt', 'not part of the course');

    const outcome = new ModuleInspector().inspect(new LocalFileAccess(packageDir));

    expect(outcome.status).toBe('parsed-valid');
    if (outcome.status === 'parsed-valid' && outcome.manifest.kind === ModuleType.AICC) {
      expect(outcome.manifest.course?.title).toBe('Hazard Signs');
      expect(outcome.manifest.courseStructure).toEqual([{ block: 'ROOT', members: ['A1'] }]);
      expect(outcome.metadata.launchUrl).toBe('signs/index.html');
    }
  });

  it('should report a cmi5 package as unparseable without a parser', () => {
    write('cmi5.xml', '<courseStructure/>');

    const outcome = new ModuleInspector().inspect(new LocalFileAccess(packageDir));

    expect(outcome.status).toBe('parse-failed');
    if (outcome.status === 'parse-failed') {
      expect(outcome.moduleType).toBe(ModuleType.CMI5);
    }
  });
});
