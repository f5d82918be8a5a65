import type { SourceGraph } from '../model/graph.js';
import type { Classification, SourceNode } from '../model/types.js';
import { BaseRule, describeTarget } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

/**
 * Whether an Intent referencing `target` breaks self-containment.
 * The contract vocabulary is the one Resource Intent may use.
 */
export function breaksContainment(target: Classification): boolean {
  if (target.contract) return false;
  return target.role === 'Capability' || target.role === 'Platform' || target.role === 'Resource';
}

/**
 * Intent must not reach Capability, Platform or Resource, whether the
 * target resolved or its role was inferred from the reference name.
 */
export class IntentCapabilityRule extends BaseRule {
  readonly id = 'intent-capability-violation';
  readonly family: RuleFamily = 'self-containment';
  readonly severity: Severity = 'error';
  readonly description = 'Intent references a Capability, Platform or non-contract Resource';

  appliesTo(node: SourceNode): boolean {
    return node.classification.role === 'Intent';
  }

  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[] {
    const violations: RuleViolation[] = [];
    for (const edge of this.localEdges(node, graph)) {
      const target = this.targetOf(edge, graph);
      if (!target || !breaksContainment(target)) continue;
      violations.push(
        this.violation(
          `Intent must stay self-contained but references ${describeTarget(target)} via '${edge.reference.specifier}'`,
          edge.reference.line
        )
      );
    }
    return violations;
  }
}
