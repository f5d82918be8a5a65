import { Command } from 'commander';
import { StageOrchestrator } from '../../core/gate/orchestrator.js';
import { ReportEmitter, exitCodeFor, serializeReport } from '../../core/report/emitter.js';
import { logger } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import {
  applyVerbosity,
  createBuilder,
  failCommand,
  parseOutputFormat,
  resolveInvocation,
  type RootOptions,
} from './shared.js';

export interface GateOptions extends RootOptions {
  skipDocs?: boolean;
  skipCode?: boolean;
  skipDialect?: string[];
  format: string;
}

/**
 * Create the gate command.
 */
export function createGateCommand(): Command {
  return new Command('gate')
    .description('Run every stage, write the report and exit with the gate verdict')
    .option('--repo-root <path>', 'Repository root (default: current directory)')
    .option('--code-root <path...>', 'Code roots, relative to the repository root')
    .option('--docs-root <path>', 'Documentation root, relative to the repository root')
    .option('--report <path>', 'Gate report path')
    .option('--skip-docs', 'Skip the documentation stage')
    .option('--skip-code', 'Skip every code stage')
    .option('--skip-dialect <id...>', 'Skip the code stages of these dialects')
    .option('--format <format>', 'Output format: human or json', 'human')
    .option('--config <path>', 'Path to config file')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action(async (options: GateOptions) => {
      try {
        applyVerbosity(options);
        process.exit(await runGate(options));
      } catch (error) {
        failCommand(error);
      }
    });
}

export async function runGate(options: GateOptions): Promise<number> {
  const format = parseOutputFormat(options.format);
  const invocation = await resolveInvocation(options);

  const orchestrator = new StageOrchestrator(createBuilder(invocation.config));
  const run = await orchestrator.run({
    repoRoot: invocation.repoRoot,
    codeRoots: invocation.codeRoots,
    ...(invocation.docsRoot !== undefined ? { docsRoot: invocation.docsRoot } : {}),
    skipDocs: options.skipDocs ?? false,
    skipCode: options.skipCode ?? false,
    skipDialects: options.skipDialect ?? [],
  });

  const emitter = new ReportEmitter({ reportPath: invocation.reportPath });
  const { report, artifactPaths } = await emitter.write(run);

  if (format === 'json') {
    process.stdout.write(serializeReport(report));
  } else {
    console.log(createFormatter('human', { verbose: options.verbose ?? false }).formatRun(run));
    logger.info(`Report written to ${invocation.reportPath} (${artifactPaths.length} stage artifact(s))`);
  }

  return exitCodeFor(run);
}
