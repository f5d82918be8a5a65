import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

export class NamingInvalidRule extends BaseRule {
  readonly id = 'naming-invalid';
  readonly family: RuleFamily = 'naming-validity';
  readonly severity: Severity = 'error';
  readonly description = 'Missing role prefix in a managed path, or a prefix placed outside its location';

  appliesTo(node: SourceNode): boolean {
    return node.classification.issue?.kind === 'naming-invalid';
  }

  evaluate(node: SourceNode): RuleViolation[] {
    const issue = node.classification.issue;
    return issue ? [this.violation(issue.message)] : [];
  }
}
