export * from './types.js';
export { BaseRule, describeTarget } from './base.js';
export { isAllowedTarget, isOwnFeature } from './direction-table.js';
export { RuleEngine, compareFindings, compareFaults } from './engine.js';
export type { EngineResult, EngineRunOptions } from './engine.js';
export { RULE_CATALOG, RULE_CATALOG_VERSION, SOURCE_EMPTY_RULE, findRule } from './catalog.js';
