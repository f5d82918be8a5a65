/**
 * Source model type definitions: classified files, references and the
 * frozen dependency graph.
 */

/**
 * Architectural role of a file, inferred from its name and placement.
 */
export type Role =
  | 'Intent'
  | 'Interpretation'
  | 'Production'
  | 'Resource'
  | 'Capability'
  | 'Platform'
  | 'DataPlane'
  | 'Unclassified';

/** Roles that belong to a single feature. */
export type FeatureRole = 'Intent' | 'Interpretation' | 'Production';

/**
 * Placement category, finer than the role (e.g. hal vs bsp for Platform).
 */
export type Category =
  | 'feature'
  | 'bootstrap'
  | 'contract'
  | 'resource'
  | 'datastream'
  | 'service'
  | 'middleware'
  | 'hal'
  | 'bsp'
  | 'unmanaged'
  | 'invalid';

export type NamingIssueKind = 'naming-invalid' | 'reserved-prefix-misuse';

export interface NamingIssue {
  kind: NamingIssueKind;
  message: string;
}

/**
 * Result of classifying one path. Computed once per file and cached on its node.
 */
export interface Classification {
  role: Role;
  /** Feature id from the enclosing project/features/<id>/ folder, '' otherwise */
  feature: string;
  /** False when the classification was inferred from a bare reference name */
  featureKnown: boolean;
  category: Category;
  /** Reserved contract vocabulary (shared types Intent may use) */
  contract: boolean;
  /** Placed under project/ (features, config, datastreams), root or nested unit */
  projectOwned: boolean;
  /** Logical module name (lowercase file name without extension) */
  name: string;
  /** Set when classification failed; the file is then Unclassified */
  issue?: NamingIssue;
}

/**
 * How a reference was declared.
 * - local: a file/module reference to resolve in-project
 * - system: a toolchain or package reference (<stdio.h>, 'node:fs')
 * - namespace: a namespace import (C# using, VB Imports), never a file
 * - identifier: a role-prefixed name used in code; a class reference only
 *   when a module of that name exists
 * - call: a call into a watched platform API (`Thread.Sleep`), never a file
 */
export type ReferenceKind = 'local' | 'system' | 'namespace' | 'identifier' | 'call';

export interface RawReference {
  specifier: string;
  line: number;
  kind: ReferenceKind;
}

/**
 * Syntactic shape used by heuristic advisories.
 */
export interface StructuralSignals {
  /** Non-blank, non-comment, non-preprocessor lines */
  codeLines: number;
  /** Decision points (if, case, ternary) */
  branchCount: number;
  /** Call expressions */
  callCount: number;
  /** Conditionals that test mode/state/status-like domain values */
  domainConditionals: number;
  /** Member accesses into another module's structure */
  externalFieldAccess: number;
  /** Header or declaration file with no behavior of its own */
  declarationOnly: boolean;
}

export type ParseFailureReason =
  | 'malformed'
  | 'read-error'
  | 'too-large'
  | 'timeout'
  | 'adapter-crash';

export interface ParseFailure {
  reason: ParseFailureReason;
  message: string;
  line?: number;
}

/** Stable node index into SourceGraph.nodes. */
export type NodeId = number;

export interface SourceNode {
  readonly id: NodeId;
  /** POSIX path relative to the code root */
  readonly path: string;
  readonly dialect: string;
  readonly classification: Classification;
  readonly references: readonly RawReference[];
  readonly signals: StructuralSignals;
  readonly parseFailure?: ParseFailure;
}

export type Resolution =
  | { readonly kind: 'resolved'; readonly target: NodeId }
  | { readonly kind: 'external' }
  | { readonly kind: 'unresolved-ambiguous'; readonly candidates: readonly string[] };

export interface DependencyEdge {
  readonly source: NodeId;
  readonly reference: RawReference;
  readonly resolution: Resolution;
  /** Role inferred from the reference name when the target did not resolve */
  readonly inferred?: Classification;
}
