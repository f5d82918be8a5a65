import type { SourceGraph } from '../model/graph.js';
import type { Classification, DependencyEdge, ReferenceKind, SourceNode } from '../model/types.js';
import type { GraphRule, RuleFamily, RuleViolation, Severity } from './types.js';

/**
 * Base class for graph rules.
 * Provides common helpers for creating violations and reading edge targets.
 */
export abstract class BaseRule implements GraphRule {
  abstract readonly id: string;
  abstract readonly family: RuleFamily;
  abstract readonly severity: Severity;
  abstract readonly description: string;

  appliesTo(_node: SourceNode, _graph: SourceGraph): boolean {
    return true;
  }

  abstract evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[];

  protected violation(message: string, line: number | null = null): RuleViolation {
    return { line, message };
  }

  /**
   * Classification of an edge's target: the resolved node's, or the one
   * inferred from the reference name.
   */
  protected targetOf(edge: DependencyEdge, graph: SourceGraph): Classification | undefined {
    if (edge.resolution.kind === 'resolved') {
      return graph.node(edge.resolution.target)?.classification;
    }
    return edge.inferred;
  }

  /**
   * Outbound edges that name a file or module (not system or namespace imports).
   */
  protected localEdges(node: SourceNode, graph: SourceGraph): DependencyEdge[] {
    return graph.outgoing(node.id).filter((edge) => isModuleReference(edge.reference.kind));
  }
}

/**
 * Short description of a target for messages: "Platform (hal) 'hal_uart'".
 */
export function describeTarget(target: Classification): string {
  const detail = target.contract ? 'contract' : target.category;
  const feature = target.feature ? `, feature '${target.feature}'` : '';
  return `${target.role} (${detail}${feature}) '${target.name}'`;
}

export function isModuleReference(kind: ReferenceKind): boolean {
  return kind === 'local' || kind === 'identifier';
}
