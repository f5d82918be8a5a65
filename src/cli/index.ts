import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createClassifyCommand } from './commands/classify.js';
import { createDocsCommand } from './commands/docs.js';
import { createGateCommand } from './commands/gate.js';
import { createGraphCommand } from './commands/graph.js';
import { createRulesCommand } from './commands/rules.js';
import { createScaffoldCommand } from './commands/scaffold.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('layergate')
    .description('Architecture-conformance gate for layered source trees')
    .version(VERSION);
  [
    createGateCommand,
    createCheckCommand,
    createDocsCommand,
    createClassifyCommand,
    createGraphCommand,
    createRulesCommand,
    createScaffoldCommand,
  ].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
