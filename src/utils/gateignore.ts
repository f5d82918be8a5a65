/**
 * .layergateignore support - gitignore-style patterns for excluding files
 * from the code scan. Paths are matched relative to the code root.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile, toPosixPath } from './file-system.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export const GATEIGNORE_FILENAME = '.layergateignore';

export interface GateIgnore {
  /**
   * Check if a relative path should be ignored.
   */
  ignores(filePath: string): boolean;

  /**
   * Filter relative paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load .layergateignore from a code root.
 * Returns an empty filter if the file doesn't exist.
 */
export async function loadGateIgnore(codeRoot: string): Promise<GateIgnore> {
  const ignorePath = join(codeRoot, GATEIGNORE_FILENAME);
  const patterns: string[] = [];

  if (await fileExists(ignorePath)) {
    try {
      patterns.push(...parseGateIgnore(await readFile(ignorePath)));
    } catch (error) {
      logger.warn(`Could not read ${ignorePath}: ${errorMessage(error)}`);
    }
  }

  return createGateIgnore(patterns);
}

export function createGateIgnore(patterns: string[]): GateIgnore {
  const ig: Ignore = ignore.default().add(patterns);

  return {
    ignores(filePath: string): boolean {
      return ig.ignores(toPosixPath(filePath));
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter((fp) => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse ignore file content (gitignore syntax: # comments, blank lines skipped).
 */
export function parseGateIgnore(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
