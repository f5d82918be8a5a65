import { Command } from 'commander';
import { DOC_RULES } from '../../core/docs/hygiene.js';
import { RULE_CATALOG, RULE_CATALOG_VERSION, SOURCE_EMPTY_RULE } from '../../core/rules/catalog.js';
import type { RuleDescriptor } from '../../core/rules/types.js';
import { compareStrings } from '../../utils/compare.js';
import { createFormatter } from '../formatters/index.js';
import { failCommand, parseOutputFormat } from './shared.js';

interface RulesOptions {
  format: string;
}

/**
 * Every rule a run can report, sorted by id.
 */
export function allRules(): RuleDescriptor[] {
  return [...RULE_CATALOG, SOURCE_EMPTY_RULE, ...DOC_RULES].sort((a, b) => compareStrings(a.id, b.id));
}

/**
 * Create the rules command.
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description(`List the rule catalog (version ${RULE_CATALOG_VERSION})`)
    .option('--format <format>', 'Output format: human or json', 'human')
    .action((options: RulesOptions) => {
      try {
        console.log(createFormatter(parseOutputFormat(options.format)).formatRules(allRules()));
      } catch (error) {
        failCommand(error);
      }
    });
}
