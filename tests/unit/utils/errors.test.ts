/**
 * Tests for the error hierarchy.
 */
import { describe, it, expect } from 'vitest';
import {
  AppForgeError,
  ValidationError,
  WriteError,
  ScanError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('AppForgeError', () => {
  it('should carry code, message and details', () => {
    const error = new ValidationError(ErrorCodes.INVALID_OPTION_VALUE, 'bad value', { option: 'provider' });

    expect(error).toBeInstanceOf(AppForgeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VAL001');
    expect(error.message).toBe('bad value');
    expect(error.details).toEqual({ option: 'provider' });
  });

  it('should serialize to JSON without the stack', () => {
    const error = new WriteError(ErrorCodes.WRITE_FAILED, 'disk full', { failedPath: 'A.swift' });

    expect(error.toJSON()).toEqual({
      name: 'WriteError',
      code: 'WRI001',
      message: 'disk full',
      details: { failedPath: 'A.swift' },
    });
  });

  it('should keep subclasses distinguishable', () => {
    const error: AppForgeError = new ScanError(ErrorCodes.ROOT_NOT_FOUND, 'missing');

    expect(error instanceof ScanError).toBe(true);
    expect(error instanceof ValidationError).toBe(false);
  });
});
