import { describe, it, expect } from 'vitest';
import {
  AdapterError,
  ConfigurationError,
  EngineFaultError,
  ErrorCodes,
  GateError,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('GateError', () => {
  it('carries code, message and details', () => {
    const error = new GateError(ErrorCodes.PARSE_ERROR, 'bad input', { line: 3 });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('GateError');
    expect(error.code).toBe('S001');
    expect(error.toJSON()).toEqual({
      name: 'GateError',
      code: 'S001',
      message: 'bad input',
      details: { line: 3 },
    });
  });

  it('names each subclass', () => {
    const errors = [
      new ConfigurationError(ErrorCodes.ROOT_NOT_FOUND, 'missing'),
      new AdapterError(ErrorCodes.FILE_TOO_LARGE, 'large'),
      new EngineFaultError(ErrorCodes.STAGE_TRANSITION, 'bad transition'),
    ];
    expect(errors.map((e) => e.name)).toEqual(['ConfigurationError', 'AdapterError', 'EngineFaultError']);
    expect(errors.map((e) => e.code)).toEqual(['C003', 'A002', 'F001']);
    expect(errors.every((e) => e instanceof GateError)).toBe(true);
  });
});

describe('errorMessage', () => {
  it('renders thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('Unknown error');
  });
});
