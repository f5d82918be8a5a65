import { Command } from 'commander';
import * as path from 'node:path';
import { DOCS_STAGE, StageOrchestrator } from '../../core/gate/orchestrator.js';
import { exitCodeFor } from '../../core/report/emitter.js';
import { writeFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { JsonFormatter, createFormatter } from '../formatters/index.js';
import {
  applyVerbosity,
  createBuilder,
  failCommand,
  parseOutputFormat,
  resolveInvocation,
  type RootOptions,
} from './shared.js';

interface CheckOptions extends RootOptions {
  skipDialect?: string[];
  format: string;
  jsonOut?: string;
}

/**
 * Create the check command: code stages only, no gate report.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check code roots against the architecture rules')
    .argument('[root]', 'Code root (default: code_roots from config)')
    .option('--repo-root <path>', 'Repository root (default: current directory)')
    .option('--skip-dialect <id...>', 'Skip these dialects')
    .option('--format <format>', 'Output format: human or json', 'human')
    .option('--json-out <path>', 'Also write the JSON result to a file')
    .option('--config <path>', 'Path to config file')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action(async (root: string | undefined, options: CheckOptions) => {
      try {
        applyVerbosity(options);
        process.exit(await runCheck(root, options));
      } catch (error) {
        failCommand(error);
      }
    });
}

async function runCheck(root: string | undefined, options: CheckOptions): Promise<number> {
  const format = parseOutputFormat(options.format);
  const invocation = await resolveInvocation({
    ...options,
    ...(root !== undefined ? { codeRoot: [root] } : {}),
  });

  const orchestrator = new StageOrchestrator(createBuilder(invocation.config));
  const run = await orchestrator.run({
    repoRoot: invocation.repoRoot,
    codeRoots: invocation.codeRoots,
    skipDocs: true,
    skipDialects: options.skipDialect ?? [],
  });
  const codeRun = { ...run, stages: run.stages.filter((stage) => stage.name !== DOCS_STAGE) };

  console.log(createFormatter(format, { verbose: options.verbose ?? false }).formatRun(codeRun));

  if (options.jsonOut) {
    const target = path.resolve(options.jsonOut);
    await writeFile(target, `${new JsonFormatter().formatRun(codeRun)}\n`);
    logger.info(`Results written to ${target}`);
  }

  return exitCodeFor(run);
}
