/**
 * Temporary directory trees for tests that touch the file system.
 */
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export function tempDirPath(label: string): string {
  return join(tmpdir(), `layergate-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

/**
 * Write files (relative path -> content) under root, creating directories.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  await mkdir(root, { recursive: true });
  for (const [relPath, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, relPath)), { recursive: true });
    await writeFile(join(root, relPath), content);
  }
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
