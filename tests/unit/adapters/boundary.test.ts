import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_ADAPTER_BUDGET,
  extractWithinBudget,
  runAdapter,
} from '../../../src/adapters/boundary.js';
import { EMPTY_SIGNALS, type ExtractionResult, type SyntaxAdapter } from '../../../src/adapters/types.js';
import { AdapterRegistry } from '../../../src/adapters/adapter-registry.js';
import { createDefaultRegistry } from '../../../src/adapters/register.js';

class ScriptedAdapter implements SyntaxAdapter {
  readonly dialect = 'scripted';
  readonly extensions = ['.x'];
  calls = 0;
  disposed = 0;

  constructor(private readonly failures: number) {}

  extract(text: string): ExtractionResult {
    this.calls++;
    if (this.calls <= this.failures) throw new Error('boom');
    return { references: [{ specifier: text.trim(), line: 1, kind: 'local' }], signals: { ...EMPTY_SIGNALS } };
  }

  dispose(): void {
    this.disposed++;
  }
}

class SpinningAdapter implements SyntaxAdapter {
  readonly dialect = 'spinning';
  readonly extensions = ['.x'];
  calls = 0;

  constructor(private readonly spinMs: number) {}

  extract(): ExtractionResult {
    this.calls++;
    const until = Date.now() + this.spinMs;
    while (Date.now() < until) {
      // busy
    }
    return { references: [], signals: { ...EMPTY_SIGNALS } };
  }

  dispose(): void {
    // Stateless
  }
}

const CONTEXT = { filePath: 'infra/service/svc_log.x', extension: '.x' };

describe('extractWithinBudget', () => {
  it('retries an adapter that throws', () => {
    const adapter = new ScriptedAdapter(1);
    const result = extractWithinBudget(adapter, 'svc_log.h', CONTEXT);
    expect(adapter.calls).toBe(2);
    expect(result.references).toEqual([{ specifier: 'svc_log.h', line: 1, kind: 'local' }]);
    expect(result.parseFailure).toBeUndefined();
  });

  it('reports a crash once every attempt failed', () => {
    const adapter = new ScriptedAdapter(5);
    const result = extractWithinBudget(adapter, 'x', CONTEXT, { ...DEFAULT_ADAPTER_BUDGET, maxAttempts: 3 });
    expect(adapter.calls).toBe(3);
    expect(result).toEqual({
      references: [],
      signals: { ...EMPTY_SIGNALS },
      parseFailure: { reason: 'adapter-crash', message: 'scripted adapter failed after 3 attempt(s): boom' },
    });
  });

  it('interrupts an extraction that outlives the time budget', () => {
    const adapter = new SpinningAdapter(1500);
    const started = Date.now();
    const result = extractWithinBudget(adapter, 'x', CONTEXT, {
      ...DEFAULT_ADAPTER_BUDGET,
      timeoutMs: 50,
    });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(result.parseFailure).toEqual({ reason: 'timeout', message: 'extraction interrupted after 50ms' });
    expect(result.references).toEqual([]);
    expect(adapter.calls).toBe(1);
  });

  it('returns results of extractions within the budget', () => {
    const result = extractWithinBudget(new SpinningAdapter(0), 'x', CONTEXT, {
      ...DEFAULT_ADAPTER_BUDGET,
      timeoutMs: 1000,
    });
    expect(result.parseFailure).toBeUndefined();
  });
});

describe('runAdapter', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `layergate-boundary-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('reads the file and extracts it', async () => {
    await writeFile(join(testDir, 'a.x'), 'svc_log.h\n');
    const result = await runAdapter(new ScriptedAdapter(0), join(testDir, 'a.x'), CONTEXT);
    expect(result.references).toEqual([{ specifier: 'svc_log.h', line: 1, kind: 'local' }]);
  });

  it('skips files over the size budget without reading them', async () => {
    await writeFile(join(testDir, 'big.x'), 'x'.repeat(20));
    const adapter = new ScriptedAdapter(0);
    const result = await runAdapter(adapter, join(testDir, 'big.x'), CONTEXT, {
      ...DEFAULT_ADAPTER_BUDGET,
      maxFileBytes: 10,
    });
    expect(adapter.calls).toBe(0);
    expect(result.parseFailure).toEqual({ reason: 'too-large', message: 'file is 20 bytes (budget 10 bytes)' });
  });

  it('turns a missing file into a read error', async () => {
    const result = await runAdapter(new ScriptedAdapter(0), join(testDir, 'missing.x'), CONTEXT);
    expect(result.parseFailure?.reason).toBe('read-error');
    expect(result.parseFailure?.message).toMatch(/^cannot stat infra\/service\/svc_log\.x: /);
  });
});

describe('AdapterRegistry', () => {
  it('maps extensions to dialects case-insensitively', () => {
    const registry = createDefaultRegistry();
    expect(registry.getRegisteredDialects()).toEqual(['c-family', 'csharp', 'typescript', 'visual-basic']);
    expect(registry.dialectForExtension('.H')).toBe('c-family');
    expect(registry.dialectForExtension('.vb')).toBe('visual-basic');
    expect(registry.dialectForExtension('.py')).toBeNull();
    expect(registry.getSupportedExtensions()).toContain('.cs');
  });

  it('creates adapters lazily and once', () => {
    const registry = new AdapterRegistry();
    let created = 0;
    const adapter = new ScriptedAdapter(0);
    registry.register('scripted', () => {
      created++;
      return adapter;
    }, ['.x']);

    expect(created).toBe(0);
    expect(registry.dialectForExtension('.X')).toBe('scripted');
    expect(created).toBe(0);
    expect(registry.getByDialect('scripted')).toBe(adapter);
    expect(registry.getByDialect('scripted')).toBe(adapter);
    expect(created).toBe(1);
    expect(registry.getByDialect('unknown')).toBeNull();
  });

  it('disposes created instances and recreates them on next use', () => {
    const registry = new AdapterRegistry();
    let created = 0;
    const adapter = new ScriptedAdapter(0);
    registry.register('scripted', () => {
      created++;
      return adapter;
    }, ['.x']);
    registry.getByDialect('scripted');
    registry.disposeAll();
    registry.disposeAll();
    expect(adapter.disposed).toBe(1);
    expect(registry.getByDialect('scripted')).toBe(adapter);
    expect(created).toBe(2);
  });
});
