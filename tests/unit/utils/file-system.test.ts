import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile as readRaw } from 'node:fs/promises';
import { join } from 'node:path';
import {
  fileExists,
  fileSize,
  globFiles,
  isDirectory,
  relativePosix,
  toPosixPath,
  writeFile,
  writeFileIfMissing,
} from '../../../src/utils/file-system.js';
import { removeTree, tempDirPath, writeTree } from '../../helpers/fs.js';

describe('file-system', () => {
  let root: string;

  beforeEach(async () => {
    root = tempDirPath('fs');
    await writeTree(root, {
      'infra/service/svc_log.c': 'int x;\n',
      'infra/service/svc_log.h': '',
      'node_modules/pkg/index.c': '',
    });
  });

  afterEach(async () => {
    await removeTree(root);
  });

  it('writes into missing directories', async () => {
    const target = join(root, 'out', 'nested', 'report.json');
    await writeFile(target, '{}');
    expect(await readRaw(target, 'utf-8')).toBe('{}');
  });

  it('never overwrites with writeFileIfMissing', async () => {
    const target = join(root, 'infra/service/svc_log.c');
    expect(await writeFileIfMissing(target, 'replaced')).toBe(false);
    expect(await readRaw(target, 'utf-8')).toBe('int x;\n');
    expect(await writeFileIfMissing(join(root, 'seed.h'), '// seed\n')).toBe(true);
  });

  it('tells files from directories', async () => {
    expect(await fileExists(join(root, 'infra/service/svc_log.h'))).toBe(true);
    expect(await fileExists(join(root, 'absent.c'))).toBe(false);
    expect(await isDirectory(join(root, 'infra'))).toBe(true);
    expect(await isDirectory(join(root, 'infra/service/svc_log.c'))).toBe(false);
    expect(await isDirectory(join(root, 'absent'))).toBe(false);
  });

  it('reports file size in bytes', async () => {
    expect(await fileSize(join(root, 'infra/service/svc_log.c'))).toBe(7);
  });

  it('globs sorted relative paths and skips node_modules by default', async () => {
    expect(await globFiles('**/*.{c,h}', { cwd: root, absolute: false })).toEqual([
      'infra/service/svc_log.c',
      'infra/service/svc_log.h',
    ]);
  });

  it('normalizes separators', () => {
    expect(toPosixPath('infra\\service\\svc_log.c')).toBe('infra/service/svc_log.c');
    expect(relativePosix('/repo', '/repo/infra/service')).toBe('infra/service');
  });
});
