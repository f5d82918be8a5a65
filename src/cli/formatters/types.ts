/**
 * Formatter type definitions.
 */
import type { GateRun } from '../../core/gate/orchestrator.js';
import type { RuleDescriptor } from '../../core/rules/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Include notes and passing stages */
  verbose: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format a completed run: stage verdicts and their findings.
   */
  formatRun(run: GateRun): string;

  /**
   * Format the rule catalog.
   */
  formatRules(rules: readonly RuleDescriptor[]): string;
}
