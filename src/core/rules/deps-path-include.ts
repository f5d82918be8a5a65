import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';
import { toPosixPath } from '../../utils/file-system.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

const DEPS_SEGMENT = /(^|\/)deps(\/|$)/;

/**
 * Feature and core code reaches dependencies through Capability modules,
 * never by spelling a deps/ path.
 */
export class DepsPathIncludeRule extends BaseRule {
  readonly id = 'deps-path-include';
  readonly family: RuleFamily = 'dependency-direction';
  readonly severity: Severity = 'error';
  readonly description = 'Intent, Interpretation or Production reference containing a deps/ path';

  appliesTo(node: SourceNode): boolean {
    const role = node.classification.role;
    return role === 'Intent' || role === 'Interpretation' || role === 'Production';
  }

  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[] {
    return this.localEdges(node, graph)
      .filter((edge) => DEPS_SEGMENT.test(toPosixPath(edge.reference.specifier)))
      .map((edge) =>
        this.violation(
          `Do not reference dependency paths directly from feature or core code: '${edge.reference.specifier}'`,
          edge.reference.line
        )
      );
  }
}
