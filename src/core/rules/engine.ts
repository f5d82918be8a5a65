/**
 * Rule engine: evaluates the catalog against a frozen source graph.
 *
 * Each (rule, file) pair yields a tagged outcome. An evaluator that throws
 * becomes a fault for that pair only; every other pair is still evaluated.
 */
import { posix } from 'node:path';
import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';
import { compareStrings } from '../../utils/compare.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { RULE_CATALOG } from './catalog.js';
import type { EngineFault, Finding, GraphRule, RuleOutcome } from './types.js';

export interface EngineResult {
  findings: Finding[];
  faults: EngineFault[];
}

export interface EngineRunOptions {
  /** Prepended to node paths so findings are relative to the repository root */
  pathPrefix?: string;
}

/**
 * Order: file, rule id, line (file-level first), message.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.file, b.file) ||
    compareStrings(a.ruleId, b.ruleId) ||
    (a.line ?? 0) - (b.line ?? 0) ||
    compareStrings(a.message, b.message)
  );
}

export function compareFaults(a: EngineFault, b: EngineFault): number {
  return (
    compareStrings(a.file ?? '', b.file ?? '') ||
    compareStrings(a.ruleId ?? '', b.ruleId ?? '') ||
    compareStrings(a.message, b.message)
  );
}

export class RuleEngine {
  private readonly rules: readonly GraphRule[];

  constructor(rules: readonly GraphRule[] = RULE_CATALOG) {
    this.rules = [...rules].sort((a, b) => compareStrings(a.id, b.id));
  }

  /**
   * Evaluate one rule against one file.
   */
  evaluate(rule: GraphRule, node: SourceNode, graph: SourceGraph, pathPrefix = ''): RuleOutcome {
    const file = posix.join(pathPrefix, node.path);
    try {
      if (!rule.appliesTo(node, graph)) return { kind: 'clean' };
      const violations = rule.evaluate(node, graph);
      if (violations.length === 0) return { kind: 'clean' };
      return {
        kind: 'violation',
        findings: violations.map((v) => ({
          ruleId: rule.id,
          severity: rule.severity,
          file,
          line: v.line,
          message: v.message,
        })),
      };
    } catch (error) {
      return { kind: 'fault', fault: { ruleId: rule.id, file, message: errorMessage(error) } };
    }
  }

  run(graph: SourceGraph, options: EngineRunOptions = {}): EngineResult {
    const findings: Finding[] = [];
    const faults: EngineFault[] = [];

    for (const rule of this.rules) {
      for (const node of graph.nodes) {
        const outcome = this.evaluate(rule, node, graph, options.pathPrefix);
        if (outcome.kind === 'violation') {
          findings.push(...outcome.findings);
        } else if (outcome.kind === 'fault') {
          logger.warn(`Rule ${rule.id} faulted on ${outcome.fault.file}: ${outcome.fault.message}`);
          faults.push(outcome.fault);
        }
      }
    }

    return { findings: findings.sort(compareFindings), faults: faults.sort(compareFaults) };
  }
}
