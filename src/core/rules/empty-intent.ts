import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

/**
 * An Intent without branching is likely a pass-through whose judgment
 * lives somewhere else.
 */
export class EmptyIntentRule extends BaseRule {
  readonly id = 'empty-intent';
  readonly family: RuleFamily = 'heuristic';
  readonly severity: Severity = 'advisory';
  readonly description = 'Intent with no branching and at most one call';

  appliesTo(node: SourceNode): boolean {
    return (
      node.classification.role === 'Intent' &&
      !node.signals.declarationOnly &&
      node.parseFailure === undefined
    );
  }

  evaluate(node: SourceNode): RuleViolation[] {
    const { branchCount, callCount } = node.signals;
    if (branchCount > 0 || callCount > 1) return [];
    return [
      this.violation(
        `Possible empty Intent: ${branchCount} branches and ${callCount} call(s); verify the domain judgment is not in Interpretation or Production`
      ),
    ];
  }
}
