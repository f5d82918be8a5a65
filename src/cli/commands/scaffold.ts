import { Command } from 'commander';
import { scaffold } from '../../core/scaffold/index.js';
import { logger } from '../../utils/logger.js';
import { applyVerbosity, failCommand, type VerbosityOptions } from './shared.js';

interface ScaffoldCommandOptions extends VerbosityOptions {
  features?: string[];
}

/**
 * Create the scaffold command.
 */
export function createScaffoldCommand(): Command {
  return new Command('scaffold')
    .description('Create the canonical folder layout of a code root')
    .argument('[root]', 'Code root to create', 'codes/main')
    .option('--features <names...>', 'Feature folders to create (comma lists accepted)')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action(async (root: string, options: ScaffoldCommandOptions) => {
      try {
        applyVerbosity(options);
        const result = await scaffold(root, { features: options.features ?? [] });

        logger.success(`Scaffold ready: ${result.root}`);
        for (const file of result.created) {
          logger.info(`Created ${file}`);
        }
        if (result.features.length > 0) {
          logger.info(`Features: ${result.features.join(', ')}`);
        }
      } catch (error) {
        failCommand(error);
      }
    });
}
