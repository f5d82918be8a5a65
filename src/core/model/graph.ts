/**
 * Immutable source graph for one code root and dialect.
 */
import type { DependencyEdge, NodeId, SourceNode } from './types.js';

export class SourceGraph {
  readonly root: string;
  readonly dialect: string;
  readonly nodes: readonly SourceNode[];
  readonly edges: readonly DependencyEdge[];
  private readonly outgoingIndex: ReadonlyMap<NodeId, readonly DependencyEdge[]>;

  constructor(root: string, dialect: string, nodes: SourceNode[], edges: DependencyEdge[]) {
    this.root = root;
    this.dialect = dialect;
    this.nodes = Object.freeze(nodes.map((n) => Object.freeze(n)));
    this.edges = Object.freeze(edges.map((e) => Object.freeze(e)));

    const outgoing = new Map<NodeId, DependencyEdge[]>();
    for (const edge of this.edges) {
      const list = outgoing.get(edge.source) ?? [];
      list.push(edge);
      outgoing.set(edge.source, list);
    }
    this.outgoingIndex = outgoing;

    Object.freeze(this);
  }

  node(id: NodeId): SourceNode | undefined {
    return this.nodes[id];
  }

  outgoing(id: NodeId): readonly DependencyEdge[] {
    return this.outgoingIndex.get(id) ?? [];
  }
}
