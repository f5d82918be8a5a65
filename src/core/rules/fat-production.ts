import type { SourceNode } from '../model/types.js';
import { BaseRule } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

/** Branches per code line above which Production looks like decision code. */
export const CONDITIONAL_DENSITY_LIMIT = 0.25;

export class FatProductionRule extends BaseRule {
  readonly id = 'fat-production';
  readonly family: RuleFamily = 'heuristic';
  readonly severity: Severity = 'advisory';
  readonly description =
    'Production with high conditional density, domain conditionals or external field access';

  appliesTo(node: SourceNode): boolean {
    return (
      node.classification.role === 'Production' &&
      !node.signals.declarationOnly &&
      node.parseFailure === undefined
    );
  }

  evaluate(node: SourceNode): RuleViolation[] {
    const { codeLines, branchCount, domainConditionals, externalFieldAccess } = node.signals;
    const reasons: string[] = [];

    const density = codeLines > 0 ? branchCount / codeLines : 0;
    if (density > CONDITIONAL_DENSITY_LIMIT) {
      reasons.push(`conditional density ${density.toFixed(2)} exceeds ${CONDITIONAL_DENSITY_LIMIT}`);
    }
    if (domainConditionals > 0) reasons.push(`${domainConditionals} domain conditional(s)`);
    if (externalFieldAccess > 0) reasons.push(`${externalFieldAccess} external field access(es)`);

    if (reasons.length === 0) return [];
    return [
      this.violation(
        `Possible fat Production: ${reasons.join('; ')}; move domain judgment to Intent or Interpretation`
      ),
    ];
  }
}
