import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';
import { BaseRule, describeTarget } from './base.js';
import { isAllowedTarget } from './direction-table.js';
import { breaksContainment } from './intent-capability-violation.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

/**
 * Every edge's target role must be in the source role's allowed set.
 * Intent edges already reported as containment breaches are skipped.
 */
export class DirectionViolationRule extends BaseRule {
  readonly id = 'direction-violation';
  readonly family: RuleFamily = 'dependency-direction';
  readonly severity: Severity = 'error';
  readonly description = "Reference to a role outside the source role's allowed targets";

  appliesTo(node: SourceNode): boolean {
    return node.classification.role !== 'Unclassified';
  }

  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[] {
    const source = node.classification;
    const violations: RuleViolation[] = [];

    for (const edge of this.localEdges(node, graph)) {
      const target = this.targetOf(edge, graph);
      if (!target) continue;
      if (source.role === 'Intent' && breaksContainment(target)) continue;
      if (isAllowedTarget(source, target)) continue;

      violations.push(
        this.violation(
          `${source.role} '${source.name}' may not depend on ${describeTarget(target)} ('${edge.reference.specifier}')`,
          edge.reference.line
        )
      );
    }
    return violations;
  }
}
