/**
 * Unit tests for ValidationEngine
 */

import { describe, it, expect } from 'vitest';
import { IssueCodes } from '../../src/issue-codes';
import { defineRule } from '../../src/rules/validation-rule';
import { ModuleType, Severity, type XapiManifest } from '../../src/types';
import { defaultRuleTable, ValidationEngine } from '../../src/validation-engine';
import { ValidationResult, warningIssue } from '../../src/validation-result';
import {
  aiccManifest,
  cmi5Manifest,
  item,
  organization,
  resource,
  scorm12Manifest,
  scorm2004Manifest,
  xapiManifest
} from '../helpers/manifests';

describe('ValidationEngine', () => {
  const engine = new ValidationEngine();

  it('should accept valid manifests of every kind', () => {
    for (const manifest of [scorm12Manifest(), scorm2004Manifest(), aiccManifest(), cmi5Manifest(), xapiManifest()]) {
      expect(engine.validate(manifest).issues, manifest.kind).toEqual([]);
    }
  });

  it('should refuse a missing manifest', () => {
    expect(() => engine.validate(null)).toThrow('manifest must not be null');
  });

  it('should report issues in rule order', () => {
    const manifest = scorm12Manifest({ identifier: '', organizations: null });

    expect(engine.validate(manifest).issues.map(issue => issue.code)).toEqual([
      IssueCodes.ORPHANED_RESOURCE,
      'SCORM12_MISSING_MANIFEST_ID',
      'SCORM12_MISSING_ORGANIZATIONS'
    ]);
  });

  it('should use the SCORM 2004 prefix for SCORM 2004 manifests', () => {
    const result = engine.validate(scorm2004Manifest({ identifier: null }));

    expect(result.issues.map(issue => issue.code)).toEqual(['SCORM2004_MISSING_MANIFEST_ID']);
  });

  it('should give identical results for repeated runs', () => {
    const manifest = scorm12Manifest({
      identifier: 'X',
      organizations: {
        defaultOrganization: 'NOPE',
        organizations: [organization('X', [item('I', 'MISSING'), item('I', '')])]
      },
      resources: { resources: [resource('R', '../up.html'), resource('R', null)] }
    });

    const first = engine.validate(manifest);
    const second = engine.validate(manifest);

    expect(first.issues.length).toBeGreaterThan(0);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('should keep an orphaned resource warning from invalidating the package', () => {
    const manifest = scorm12Manifest({
      resources: { resources: [resource('RES-1'), resource('RES-2', 'extra.html')] }
    });

    const result = engine.validate(manifest);

    expect(result.isValid).toBe(true);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      code: IssueCodes.ORPHANED_RESOURCE,
      severity: Severity.WARNING,
      message: "Resource 'RES-2' is not referenced by any item"
    });
  });

  it('should report a package without launchable resources as invalid', () => {
    const manifest = scorm12Manifest({ resources: { resources: [resource('RES-1', null)] } });

    const result = engine.validate(manifest);

    expect(result.isValid).toBe(false);
    expect(result.issues.map(issue => issue.code)).toContain('SCORM12_NO_LAUNCHABLE_RESOURCES');
  });

  it('should name a missing resource in exactly one issue', () => {
    const manifest = scorm12Manifest({
      organizations: { defaultOrganization: 'ORG-1', organizations: [organization('ORG-1', [item('ITEM-1', 'R')])] }
    });

    const missing = engine.validate(manifest).issues.filter(issue => issue.code === 'SCORM12_MISSING_RESOURCE_REF');

    expect(missing).toHaveLength(1);
    expect(missing[0].message).toContain("'R'");
  });

  it('should run a custom rule table', () => {
    const custom = defineRule<XapiManifest>('Custom', 'Local policy', () =>
      ValidationResult.of(warningIssue('CUSTOM', 'Custom check', 'tincan.xml'))
    );
    const customEngine = new ValidationEngine({ ...defaultRuleTable(), [ModuleType.XAPI]: [custom] });

    expect(customEngine.validate(xapiManifest({ activities: [] })).issues.map(issue => issue.code)).toEqual(['CUSTOM']);
    expect(customEngine.rulesFor(ModuleType.XAPI)).toEqual([custom]);
  });

  it('should expose the rules for each module type', () => {
    expect(engine.rulesFor(ModuleType.SCORM_12)).toHaveLength(14);
    expect(engine.rulesFor(ModuleType.AICC).map(rule => rule.name)).toEqual([
      'CourseRequired',
      'TitleRequired',
      'LaunchUrlRequired',
      'UniqueAssignableUnitIds',
      'PrerequisiteSyntax',
      'AssignableUnitReferences'
    ]);
  });
});
