import { Command } from 'commander';
import { DOCS_STAGE, StageOrchestrator } from '../../core/gate/orchestrator.js';
import { exitCodeFor } from '../../core/report/emitter.js';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { createFormatter } from '../formatters/index.js';
import {
  applyVerbosity,
  createBuilder,
  failCommand,
  parseOutputFormat,
  resolveInvocation,
  type RootOptions,
} from './shared.js';

interface DocsOptions extends RootOptions {
  format: string;
}

/**
 * Create the docs command: the documentation hygiene stage alone.
 */
export function createDocsCommand(): Command {
  return new Command('docs')
    .description('Check documentation naming, headings and encoding')
    .option('--repo-root <path>', 'Repository root (default: current directory)')
    .option('--docs-root <path>', 'Documentation root (default: docs_root from config, else specs/)')
    .option('--format <format>', 'Output format: human or json', 'human')
    .option('--config <path>', 'Path to config file')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action(async (options: DocsOptions) => {
      try {
        applyVerbosity(options);
        process.exit(await runDocs(options));
      } catch (error) {
        failCommand(error);
      }
    });
}

async function runDocs(options: DocsOptions): Promise<number> {
  const format = parseOutputFormat(options.format);
  const invocation = await resolveInvocation(options);
  if (invocation.docsRoot === undefined) {
    throw new ConfigurationError(
      ErrorCodes.INVALID_ARGUMENT,
      'No documentation root: pass --docs-root or set docs_root in the config'
    );
  }

  const orchestrator = new StageOrchestrator(createBuilder(invocation.config));
  const run = await orchestrator.run({
    repoRoot: invocation.repoRoot,
    codeRoots: [],
    docsRoot: invocation.docsRoot,
  });
  const docsRun = { ...run, stages: run.stages.filter((stage) => stage.name === DOCS_STAGE) };

  console.log(createFormatter(format, { verbose: options.verbose ?? false }).formatRun(docsRun));
  return exitCodeFor(run);
}
