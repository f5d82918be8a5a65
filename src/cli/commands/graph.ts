import { Command } from 'commander';
import chalk from 'chalk';
import { GRAPH_FORMATS, formatGraph, isGraphFormat } from '../../core/model/graph-format.js';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { isDirectory } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import {
  applyVerbosity,
  createBuilder,
  failCommand,
  resolveInvocation,
  selectCodeRoot,
  type RootOptions,
} from './shared.js';

interface GraphOptions extends RootOptions {
  format: string;
  dialect?: string;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Print the dependency graph of a code root')
    .argument('[root]', 'Code root (default: first code root from config)')
    .option('--repo-root <path>', 'Repository root (default: current directory)')
    .option('-f, --format <format>', 'Output format (json, mermaid)', 'mermaid')
    .option('--dialect <id>', 'Only this dialect')
    .option('--config <path>', 'Path to config file')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action(async (root: string | undefined, options: GraphOptions) => {
      try {
        applyVerbosity(options);
        await runGraph(root, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function runGraph(root: string | undefined, options: GraphOptions): Promise<void> {
  const format = options.format;
  if (!isGraphFormat(format)) {
    throw new ConfigurationError(
      ErrorCodes.INVALID_ARGUMENT,
      `Invalid format: ${format}. Use: ${GRAPH_FORMATS.join(', ')}`
    );
  }

  const invocation = await resolveInvocation(options);
  const codeRoot = selectCodeRoot(invocation, root);
  if (codeRoot === undefined) {
    throw new ConfigurationError(ErrorCodes.INVALID_ARGUMENT, 'No code root: pass [root] or set code_roots in the config');
  }

  if (!(await isDirectory(codeRoot))) {
    throw new ConfigurationError(ErrorCodes.ROOT_NOT_FOUND, `The code root does not exist: ${codeRoot}`, { path: codeRoot });
  }

  const builder = createBuilder(invocation.config);
  const graphs = await builder.scan(codeRoot);
  const selected = [...graphs.values()].filter((g) => options.dialect === undefined || g.dialect === options.dialect);

  if (selected.length === 0) {
    log.warn(`No source files found under ${codeRoot}`);
    return;
  }

  for (const graph of selected) {
    const output = formatGraph(graph, format);
    if (format === 'json') {
      console.log(output);
      continue;
    }
    console.log();
    console.log(chalk.bold(`Dependency Graph: ${graph.dialect}`));
    console.log(chalk.dim('─'.repeat(50)));
    console.log(output);
    console.log(chalk.dim('─'.repeat(50)));
    console.log(chalk.dim(`Files: ${graph.nodes.length}, References: ${graph.edges.length}`));
  }
}
