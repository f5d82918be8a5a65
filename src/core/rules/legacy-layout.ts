import type { SourceNode } from '../model/types.js';
import { legacyLayoutOf } from '../model/classifier.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

export class LegacyLayoutRule extends BaseRule {
  readonly id = 'legacy-layout';
  readonly family: RuleFamily = 'legacy-layout';
  readonly severity: Severity = 'error';
  readonly description = 'File under a deprecated layout path';

  evaluate(node: SourceNode): RuleViolation[] {
    const layout = legacyLayoutOf(node.path);
    if (!layout) return [];
    return [this.violation(`Legacy layout '${layout.path}' is deprecated; migrate to ${layout.replacement}`)];
  }
}
