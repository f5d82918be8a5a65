/**
 * The closed rule catalog.
 *
 * Severities are fixed per rule. There is no profile, override or disable
 * switch; the catalog changes only by adding rules and bumping the version.
 */
import { CrossFeatureImportRule } from './cross-feature-import.js';
import { DepsPathIncludeRule } from './deps-path-include.js';
import { DirectionViolationRule } from './direction-violation.js';
import { EmptyIntentRule } from './empty-intent.js';
import { FatProductionRule } from './fat-production.js';
import { IntentCapabilityRule } from './intent-capability-violation.js';
import { IntentForbiddenApiRule } from './intent-forbidden-api.js';
import { LegacyLayoutRule } from './legacy-layout.js';
import { NamingInvalidRule } from './naming-invalid.js';
import { ParseFailureRule } from './parse-failure.js';
import { ReservedPrefixMisuseRule } from './reserved-prefix-misuse.js';
import { UnresolvedAmbiguousRule } from './unresolved-ambiguous.js';
import { compareStrings } from '../../utils/compare.js';
import type { GraphRule, RuleDescriptor } from './types.js';

export const RULE_CATALOG_VERSION = '1.0.0';

/**
 * Graph rules in evaluation (id) order.
 */
export const RULE_CATALOG: readonly GraphRule[] = Object.freeze(
  [
    new CrossFeatureImportRule(),
    new DepsPathIncludeRule(),
    new DirectionViolationRule(),
    new EmptyIntentRule(),
    new FatProductionRule(),
    new IntentCapabilityRule(),
    new IntentForbiddenApiRule(),
    new LegacyLayoutRule(),
    new NamingInvalidRule(),
    new ParseFailureRule(),
    new ReservedPrefixMisuseRule(),
    new UnresolvedAmbiguousRule(),
  ].sort((a, b) => compareStrings(a.id, b.id))
);

/**
 * Raised by the orchestrator when a code root holds no in-scope file.
 */
export const SOURCE_EMPTY_RULE: RuleDescriptor = {
  id: 'source-empty',
  family: 'source',
  severity: 'error',
  description: 'Code root contains no source file of any registered dialect',
};

export function findRule(id: string): GraphRule | undefined {
  return RULE_CATALOG.find((rule) => rule.id === id);
}
