import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

/**
 * Features stay isolated: no resolved edge may connect two different
 * features, except into a DataPlane.
 */
export class CrossFeatureImportRule extends BaseRule {
  readonly id = 'cross-feature-import';
  readonly family: RuleFamily = 'feature-isolation';
  readonly severity: Severity = 'error';
  readonly description = 'Reference from one feature into another feature';

  appliesTo(node: SourceNode): boolean {
    return node.classification.feature !== '';
  }

  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[] {
    const feature = node.classification.feature;
    const violations: RuleViolation[] = [];

    for (const edge of graph.outgoing(node.id)) {
      if (edge.resolution.kind !== 'resolved') continue;
      const target = graph.node(edge.resolution.target);
      if (!target) continue;

      const other = target.classification.feature;
      if (other === '' || other === feature || target.classification.role === 'DataPlane') continue;

      violations.push(
        this.violation(
          `Feature '${feature}' references '${target.path}' of feature '${other}'`,
          edge.reference.line
        )
      );
    }
    return violations;
  }
}
