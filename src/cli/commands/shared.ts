/**
 * Helpers shared by the gate commands: option merging over the config
 * file, builder construction and exit handling.
 */
import * as path from 'node:path';
import { createDefaultRegistry } from '../../adapters/register.js';
import { budgetFromConfig, loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { SourceModelBuilder } from '../../core/model/builder.js';
import { ExitCodes } from '../../core/report/emitter.js';
import { ConfigurationError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { isDirectory } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters/index.js';

/** Documentation root used when neither a flag nor the config names one. */
export const DEFAULT_DOCS_ROOT = 'specs';

export interface VerbosityOptions {
  quiet?: boolean;
  verbose?: boolean;
}

export interface RootOptions extends VerbosityOptions {
  repoRoot?: string;
  codeRoot?: string[];
  docsRoot?: string;
  report?: string;
  config?: string;
}

export interface Invocation {
  repoRoot: string;
  config: Config;
  codeRoots: string[];
  docsRoot?: string;
  reportPath: string;
}

export function applyVerbosity(options: VerbosityOptions): void {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  }
}

/**
 * Merge CLI flags over the config file. Relative paths are taken from the
 * repository root.
 */
export async function resolveInvocation(options: RootOptions): Promise<Invocation> {
  const repoRoot = path.resolve(options.repoRoot ?? process.cwd());
  const config = await loadConfig(repoRoot, options.config);

  const codeRoots = (options.codeRoot ?? config.code_roots).map((root) => path.resolve(repoRoot, root));
  const reportPath = path.resolve(repoRoot, options.report ?? config.report_path);

  const docsRootOption = options.docsRoot ?? config.docs_root;
  let docsRoot: string | undefined;
  if (docsRootOption !== undefined) {
    docsRoot = path.resolve(repoRoot, docsRootOption);
  } else if (await isDirectory(path.resolve(repoRoot, DEFAULT_DOCS_ROOT))) {
    docsRoot = path.resolve(repoRoot, DEFAULT_DOCS_ROOT);
  }

  return { repoRoot, config, codeRoots, ...(docsRoot !== undefined ? { docsRoot } : {}), reportPath };
}

/**
 * Code root named on the command line, else the first configured one.
 * A relative argument is taken from the repository root.
 */
export function selectCodeRoot(invocation: Invocation, root: string | undefined): string | undefined {
  return root !== undefined ? path.resolve(invocation.repoRoot, root) : invocation.codeRoots[0];
}

export function createBuilder(config: Config): SourceModelBuilder {
  return new SourceModelBuilder(createDefaultRegistry(), {
    ...(config.engine.concurrency !== undefined ? { concurrency: config.engine.concurrency } : {}),
    budget: budgetFromConfig(config),
    exclude: config.scan.exclude,
  });
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new ConfigurationError(
      ErrorCodes.INVALID_ARGUMENT,
      `Invalid format: ${value}. Use: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return format;
}

/**
 * Exit code for an error that escaped a command.
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof ConfigurationError ? ExitCodes.CONFIGURATION_ERROR : ExitCodes.ENGINE_FAULT;
}

/**
 * Log an error that escaped a command and exit.
 */
export function failCommand(error: unknown): never {
  logger.error(errorMessage(error), error instanceof ConfigurationError ? undefined : toError(error));
  process.exit(exitCodeForError(error));
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
