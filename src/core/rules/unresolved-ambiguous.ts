import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

export class UnresolvedAmbiguousRule extends BaseRule {
  readonly id = 'unresolved-ambiguous';
  readonly family: RuleFamily = 'resolution';
  readonly severity: Severity = 'advisory';
  readonly description = 'Reference name matches modules in several folders';

  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[] {
    const violations: RuleViolation[] = [];
    for (const edge of graph.outgoing(node.id)) {
      if (edge.resolution.kind !== 'unresolved-ambiguous') continue;
      const candidates = edge.resolution.candidates;
      violations.push(
        this.violation(
          `Reference '${edge.reference.specifier}' matches ${candidates.length} modules (${candidates.join(', ')}); add a directory to disambiguate`,
          edge.reference.line
        )
      );
    }
    return violations;
  }
}
