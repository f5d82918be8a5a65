import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

export class ReservedPrefixMisuseRule extends BaseRule {
  readonly id = 'reserved-prefix-misuse';
  readonly family: RuleFamily = 'naming-validity';
  readonly severity: Severity = 'error';
  readonly description = "The layout-only prefix 'inf_' used to name a file";

  appliesTo(node: SourceNode): boolean {
    return node.classification.issue?.kind === 'reserved-prefix-misuse';
  }

  evaluate(node: SourceNode): RuleViolation[] {
    const issue = node.classification.issue;
    return issue ? [this.violation(issue.message)] : [];
  }
}
