import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { Logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const stderr = vi.spyOn(console, 'error');

  beforeEach(() => {
    stderr.mockReset();
    stderr.mockImplementation(() => undefined);
  });

  afterAll(() => {
    stderr.mockRestore();
  });

  it('drops messages below its level', () => {
    const log = new Logger();
    log.setLevel('warn');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('[WARN] shown'));
  });

  it('logs nothing when silent', () => {
    const log = new Logger();
    log.setLevel('silent');
    log.error('hidden');
    log.success('hidden');
    expect(stderr).not.toHaveBeenCalled();
  });

  it('prefixes child loggers and inherits the level', () => {
    const parent = new Logger();
    parent.setLevel('debug');
    const child = parent.child('model').child('csharp');
    expect(child.getLevel()).toBe('debug');
    child.debug('scanning');
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] [model:csharp] scanning'));
  });

  it('prints structured data after the message', () => {
    const log = new Logger();
    log.info('counts', { files: 2 });
    expect(stderr).toHaveBeenCalledTimes(2);
    expect(stderr).toHaveBeenLastCalledWith(expect.stringContaining('"files": 2'));
  });
});
