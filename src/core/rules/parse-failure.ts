import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

export class ParseFailureRule extends BaseRule {
  readonly id = 'parse-failure';
  readonly family: RuleFamily = 'extraction';
  readonly severity: Severity = 'error';
  readonly description = 'File could not be read or parsed; its references are unknown';

  appliesTo(node: SourceNode): boolean {
    return node.parseFailure !== undefined;
  }

  evaluate(node: SourceNode): RuleViolation[] {
    const failure = node.parseFailure;
    if (!failure) return [];
    return [this.violation(`Cannot extract references (${failure.reason}): ${failure.message}`, failure.line ?? null)];
  }
}
