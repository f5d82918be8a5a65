import { Command } from 'commander';
import { classify } from '../../core/model/classifier.js';
import { toPosixPath } from '../../utils/file-system.js';
import { applyVerbosity, failCommand, parseOutputFormat, type VerbosityOptions } from './shared.js';

interface ClassifyOptions extends VerbosityOptions {
  format: string;
}

/**
 * Create the classify command.
 */
export function createClassifyCommand(): Command {
  return new Command('classify')
    .description('Print the role, feature and category of paths relative to a code root')
    .argument('<paths...>', 'Paths relative to the code root')
    .option('--format <format>', 'Output format: human or json', 'human')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action((paths: string[], options: ClassifyOptions) => {
      try {
        applyVerbosity(options);
        console.log(renderClassifications(paths, parseOutputFormat(options.format) === 'json'));
      } catch (error) {
        failCommand(error);
      }
    });
}

export function renderClassifications(paths: readonly string[], json: boolean): string {
  const rows = paths.map((p) => {
    const relPath = toPosixPath(p);
    const c = classify(relPath);
    return {
      path: relPath,
      role: c.role,
      feature: c.feature,
      category: c.contract ? 'contract' : c.category,
      ...(c.issue ? { issue: c.issue.message } : {}),
    };
  });

  if (json) return JSON.stringify(rows, null, 2);

  return rows
    .map((row) => {
      const feature = row.feature ? ` feature=${row.feature}` : '';
      const issue = row.issue ? ` (${row.issue})` : '';
      return `${row.path}: ${row.role} [${row.category}]${feature}${issue}`;
    })
    .join('\n');
}
