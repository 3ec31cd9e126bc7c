/**
 * Validation Engine - Runs the fixed rule list for a manifest's kind
 */

import { aiccRules } from './rules/aicc-rules';
import { cmi5Rules } from './rules/cmi5-rules';
import { contentPackageRules } from './rules/content-package-rules';
import { requireManifest, type ValidationRule } from './rules/validation-rule';
import { xapiRules } from './rules/xapi-rules';
import { ModuleType, type ManifestOf, type PackageManifest } from './types';
import { ValidationResult } from './validation-result';

export type RuleTable = {
  readonly [K in ModuleType]: readonly ValidationRule<ManifestOf<K>>[];
};

export function defaultRuleTable(): RuleTable {
  return {
    [ModuleType.SCORM_12]: contentPackageRules('SCORM12'),
    [ModuleType.SCORM_2004]: contentPackageRules('SCORM2004'),
    [ModuleType.AICC]: aiccRules(),
    [ModuleType.CMI5]: cmi5Rules(),
    [ModuleType.XAPI]: xapiRules()
  };
}

export class ValidationEngine {
  private readonly table: RuleTable;

  constructor(table: RuleTable = defaultRuleTable()) {
    this.table = table;
  }

  /**
   * Run every rule registered for the manifest's kind. Issues keep rule
   * order, then the order each rule reported them.
   */
  validate(manifest: PackageManifest | null | undefined): ValidationResult {
    const checked = requireManifest(manifest);

    switch (checked.kind) {
      case ModuleType.SCORM_12:
        return this.run(this.table[ModuleType.SCORM_12], checked);
      case ModuleType.SCORM_2004:
        return this.run(this.table[ModuleType.SCORM_2004], checked);
      case ModuleType.AICC:
        return this.run(this.table[ModuleType.AICC], checked);
      case ModuleType.CMI5:
        return this.run(this.table[ModuleType.CMI5], checked);
      case ModuleType.XAPI:
        return this.run(this.table[ModuleType.XAPI], checked);
    }
  }

  rulesFor<T extends ModuleType>(type: T): RuleTable[T] {
    return this.table[type];
  }

  private run<M>(rules: readonly ValidationRule<M>[], manifest: M): ValidationResult {
    return rules.reduce(
      (result, rule) => result.merge(rule.validate(manifest)),
      ValidationResult.valid()
    );
  }
}
