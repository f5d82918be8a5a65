import { describe, it, expect } from 'vitest';
import { STAGE_EXIT_CODES, Stage } from '../../../../src/core/gate/stage.js';
import type { Finding } from '../../../../src/core/rules/types.js';
import { EngineFaultError } from '../../../../src/utils/errors.js';

const ERROR: Finding = { ruleId: 'naming-invalid', severity: 'error', file: 'a.c', line: null, message: 'bad' };
const ADVISORY: Finding = { ruleId: 'empty-intent', severity: 'advisory', file: 'b.c', line: null, message: 'hm' };

describe('Stage', () => {
  it('passes when only advisories are found', async () => {
    const stage = new Stage('code');
    const result = await stage.run(async () => ({ findings: [ADVISORY], faults: [], note: 'n' }));
    expect(result).toEqual({
      name: 'code',
      status: 'pass',
      exitCode: 0,
      note: 'n',
      findings: [ADVISORY],
      faults: [],
      errorCount: 0,
      advisoryCount: 1,
    });
    expect(stage.current).toBe('pass');
  });

  it('fails on any error finding', async () => {
    const result = await new Stage('code').run(async () => ({ findings: [ERROR, ADVISORY], faults: [], note: '' }));
    expect(result.status).toBe('fail');
    expect(result.exitCode).toBe(1);
    expect(result.errorCount).toBe(1);
  });

  it('ends errored when the work reports faults', async () => {
    const fault = { ruleId: 'direction-violation', file: 'a.c', message: 'boom' };
    const result = await new Stage('code').run(async () => ({ findings: [ERROR], faults: [fault], note: '' }));
    expect(result.status).toBe('errored');
    expect(result.exitCode).toBe(2);
  });

  it('contains a throwing stage as an errored result', async () => {
    const result = await new Stage('docs').run(() => Promise.reject(new Error('disk gone')));
    expect(result.status).toBe('errored');
    expect(result.note).toBe('internal fault');
    expect(result.faults).toEqual([{ ruleId: null, file: null, message: 'disk gone' }]);
  });

  it('skips only from pending', async () => {
    const stage = new Stage('docs');
    expect(stage.skip('not asked').status).toBe('skipped');
    expect(() => stage.transition('running')).toThrow(EngineFaultError);

    const ran = new Stage('code');
    await ran.run(async () => ({ findings: [], faults: [], note: '' }));
    expect(() => ran.skip('late')).toThrow("Stage 'code' cannot move from pass to skipped");
  });

  it('maps final states to exit codes', () => {
    expect(STAGE_EXIT_CODES).toEqual({ pass: 0, fail: 1, errored: 2, skipped: 0 });
  });
});
