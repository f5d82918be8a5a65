/**
 * Renders a source graph as JSON or a Mermaid diagram.
 */
import type { SourceGraph } from './graph.js';
import type { Category, ReferenceKind, Role } from './types.js';

export type GraphFormat = 'json' | 'mermaid';

export const GRAPH_FORMATS: readonly GraphFormat[] = ['json', 'mermaid'];

export function isGraphFormat(value: string): value is GraphFormat {
  return GRAPH_FORMATS.some((format) => format === value);
}

export interface GraphViewNode {
  id: number;
  path: string;
  role: Role;
  feature: string;
  category: Category;
}

export interface GraphViewEdge {
  from: string;
  /** Target path when resolved */
  to: string | null;
  specifier: string;
  line: number;
  kind: ReferenceKind;
  resolution: 'resolved' | 'external' | 'unresolved-ambiguous';
  candidates?: string[];
}

export interface GraphView {
  dialect: string;
  nodes: GraphViewNode[];
  edges: GraphViewEdge[];
}

export function toGraphView(graph: SourceGraph): GraphView {
  const pathOf = (id: number): string => graph.node(id)?.path ?? `#${id}`;

  return {
    dialect: graph.dialect,
    nodes: graph.nodes.map((node) => ({
      id: node.id,
      path: node.path,
      role: node.classification.role,
      feature: node.classification.feature,
      category: node.classification.category,
    })),
    edges: graph.edges.map((edge): GraphViewEdge => {
      const base = {
        from: pathOf(edge.source),
        specifier: edge.reference.specifier,
        line: edge.reference.line,
        kind: edge.reference.kind,
      };
      switch (edge.resolution.kind) {
        case 'resolved':
          return { ...base, to: pathOf(edge.resolution.target), resolution: 'resolved' };
        case 'unresolved-ambiguous':
          return { ...base, to: null, resolution: 'unresolved-ambiguous', candidates: [...edge.resolution.candidates] };
        default:
          return { ...base, to: null, resolution: 'external' };
      }
    }),
  };
}

const ROLE_STYLES: ReadonlyArray<[Role, string]> = [
  ['Intent', 'fill:#e8f5e9,stroke:#1b5e20'],
  ['Interpretation', 'fill:#e3f2fd,stroke:#0d47a1'],
  ['Production', 'fill:#fff3e0,stroke:#e65100'],
  ['Resource', 'fill:#f3e5f5,stroke:#4a148c'],
  ['Capability', 'fill:#e0f7fa,stroke:#006064'],
  ['Platform', 'fill:#eceff1,stroke:#263238'],
  ['DataPlane', 'fill:#fffde7,stroke:#f57f17'],
];

function mermaidLabel(text: string): string {
  return text.replace(/"/g, '#quot;');
}

/**
 * Mermaid flowchart of resolved edges. Nodes are styled by role.
 */
export function formatMermaid(graph: SourceGraph): string {
  const lines: string[] = ['graph TD'];

  for (const node of graph.nodes) {
    lines.push(`    n${node.id}["${mermaidLabel(node.path)}<br/>${node.classification.role}"]`);
  }

  const seen = new Set<string>();
  for (const edge of graph.edges) {
    if (edge.resolution.kind !== 'resolved') continue;
    const line = `    n${edge.source} --> n${edge.resolution.target}`;
    if (seen.has(line)) continue;
    seen.add(line);
    lines.push(line);
  }

  for (const [role, style] of ROLE_STYLES) {
    const ids = graph.nodes.filter((n) => n.classification.role === role).map((n) => `n${n.id}`);
    if (ids.length === 0) continue;
    const className = role.toLowerCase();
    lines.push(`    classDef ${className} ${style}`);
    lines.push(`    class ${ids.join(',')} ${className}`);
  }

  return lines.join('\n');
}

export function formatGraph(graph: SourceGraph, format: GraphFormat): string {
  switch (format) {
    case 'mermaid':
      return formatMermaid(graph);
    case 'json':
      return JSON.stringify(toGraphView(graph), null, 2);
  }
}
