/**
 * Rule engine type definitions.
 */
import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';

/**
 * Fixed severity. Error findings fail a stage; advisory findings are reported only.
 */
export type Severity = 'error' | 'advisory';

export type RuleFamily =
  | 'dependency-direction'
  | 'feature-isolation'
  | 'self-containment'
  | 'naming-validity'
  | 'legacy-layout'
  | 'heuristic'
  | 'resolution'
  | 'extraction'
  | 'documentation'
  | 'source';

export interface Finding {
  readonly ruleId: string;
  readonly severity: Severity;
  /** POSIX path relative to the repository root */
  readonly file: string;
  readonly line: number | null;
  readonly message: string;
}

export interface RuleDescriptor {
  readonly id: string;
  readonly family: RuleFamily;
  readonly severity: Severity;
  readonly description: string;
}

export interface RuleViolation {
  line: number | null;
  message: string;
}

/**
 * A rule over the frozen source graph. Evaluators only read the graph.
 */
export interface GraphRule extends RuleDescriptor {
  appliesTo(node: SourceNode, graph: SourceGraph): boolean;
  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[];
}

/**
 * Failure of the gate itself (an evaluator threw, a stage broke), kept
 * apart from findings about the scanned code.
 */
export interface EngineFault {
  readonly ruleId: string | null;
  readonly file: string | null;
  readonly message: string;
}

export type RuleOutcome =
  | { readonly kind: 'clean' }
  | { readonly kind: 'violation'; readonly findings: readonly Finding[] }
  | { readonly kind: 'fault'; readonly fault: EngineFault };
