/**
 * Creates the canonical layout of a code root.
 */
import * as path from 'node:path';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { ensureDir, writeFileIfMissing } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { ScaffoldOptions, ScaffoldResult } from './types.js';

export const LAYOUT_DIRECTORIES: readonly string[] = [
  'project',
  'project/config',
  'project/datastreams',
  'project/features',
  'infra',
  'infra/bootstrap',
  'infra/service',
  'infra/platform',
  'infra/platform/hal',
  'infra/platform/bsp',
  'deps',
  'deps/extern',
  'deps/middleware',
];

const CONTRACT_HEADER = [
  '#ifndef CFG_CORE_H',
  '#define CFG_CORE_H',
  '',
  '/* Contract vocabulary: shared types and interfaces. */',
  '',
  '#endif /* CFG_CORE_H */',
  '',
].join('\n');

const PROJECT_HEADER = [
  '#ifndef CFG_PROJECT_H',
  '#define CFG_PROJECT_H',
  '',
  '/* Project target interface (customize per project).',
  ' * Interpretation and Production may include this header; Intent must not. */',
  '',
  '#endif /* CFG_PROJECT_H */',
  '',
].join('\n');

const SEED_FILES: ReadonlyArray<{ relPath: string; content: string }> = [
  { relPath: 'infra/bootstrap/cfg_core.h', content: CONTRACT_HEADER },
  { relPath: 'project/config/cfg_project.h', content: PROJECT_HEADER },
];

const INVALID_PATH_CHARS = /[<>:"/\\|?*]/;
const CONTROL_CHARS = /[\u0000-\u001f]/;

/**
 * Throws when a name cannot be used as a single feature folder.
 */
export function assertValidFeatureName(name: string): void {
  const trimmed = name.trim();
  const fail = (reason: string): never => {
    throw new ConfigurationError(ErrorCodes.INVALID_ARGUMENT, `Invalid feature name '${trimmed}': ${reason}`, {
      feature: trimmed,
    });
  };

  if (!trimmed) fail('cannot be empty');
  if (trimmed.includes('/') || trimmed.includes('\\')) fail('must be a folder name, not a path');
  if (/^\.+$/.test(trimmed)) fail('cannot consist only of dots');
  if (INVALID_PATH_CHARS.test(trimmed)) fail('contains invalid path characters');
  if (CONTROL_CHARS.test(trimmed)) fail('contains control characters');
  if (trimmed.startsWith('.')) fail('must be a folder name, not a path');
}

/**
 * Split comma lists, trim, drop blanks, de-duplicate and sort.
 */
export function normalizeFeatureNames(values: readonly string[]): string[] {
  const names = values.flatMap((value) => value.split(',')).map((item) => item.trim());
  return [...new Set(names.filter((name) => name.length > 0))].sort();
}

export async function scaffold(root: string, options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
  const features = normalizeFeatureNames(options.features ?? []);
  // Validate everything before touching the disk
  features.forEach(assertValidFeatureName);

  const absRoot = path.resolve(root);
  for (const dir of LAYOUT_DIRECTORIES) {
    await ensureDir(path.join(absRoot, dir));
  }

  const created: string[] = [];
  for (const seed of SEED_FILES) {
    if (await writeFileIfMissing(path.join(absRoot, seed.relPath), seed.content)) {
      created.push(seed.relPath);
    }
  }

  for (const feature of features) {
    await ensureDir(path.join(absRoot, 'project', 'features', feature));
  }

  logger.debug('Scaffold written', { root: absRoot, created: created.length, features: features.length });
  return { root: absRoot, directories: [...LAYOUT_DIRECTORIES], created, features };
}
