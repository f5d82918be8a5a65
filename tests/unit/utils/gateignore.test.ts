import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  GATEIGNORE_FILENAME,
  createGateIgnore,
  loadGateIgnore,
  parseGateIgnore,
} from '../../../src/utils/gateignore.js';

describe('parseGateIgnore', () => {
  it('drops comments and blank lines', () => {
    expect(parseGateIgnore('# vendored\n\ndeps/extern/zlib/\n  *.gen.c  \n')).toEqual([
      'deps/extern/zlib/',
      '*.gen.c',
    ]);
  });
});

describe('createGateIgnore', () => {
  const ig = createGateIgnore(['deps/extern/zlib/', '*.gen.c', '!keep.gen.c']);

  it('matches gitignore-style patterns', () => {
    expect(ig.ignores('deps/extern/zlib/inflate.c')).toBe(true);
    expect(ig.ignores('infra/service/table.gen.c')).toBe(true);
    expect(ig.ignores('keep.gen.c')).toBe(false);
    expect(ig.ignores('infra/service/svc_log.c')).toBe(false);
  });

  it('accepts Windows separators', () => {
    expect(ig.ignores('deps\\extern\\zlib\\inflate.c')).toBe(true);
  });

  it('filters paths and exposes its patterns', () => {
    expect(ig.filter(['a.gen.c', 'svc_log.c'])).toEqual(['svc_log.c']);
    expect(ig.patterns()).toEqual(['deps/extern/zlib/', '*.gen.c', '!keep.gen.c']);
  });
});

describe('loadGateIgnore', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `layergate-ignore-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('returns an empty filter when the file is absent', async () => {
    const ig = await loadGateIgnore(testDir);
    expect(ig.patterns()).toEqual([]);
    expect(ig.ignores('anything.c')).toBe(false);
  });

  it('reads patterns from the code root', async () => {
    await writeFile(join(testDir, GATEIGNORE_FILENAME), 'tools/\n');
    const ig = await loadGateIgnore(testDir);
    expect(ig.ignores('tools/gen.c')).toBe(true);
  });
});
