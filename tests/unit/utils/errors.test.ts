/**
 * Tests for error types.
 */
import { describe, it, expect } from 'vitest';
import {
  BridgegenError,
  ConfigError,
  ErrorCodes,
  GenerateError,
  SystemError,
} from '../../../src/utils/errors.js';

describe('BridgegenError', () => {
  it('carries code, message and details', () => {
    const error = new BridgegenError('X001', 'went wrong', { file: 'a.idl' });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('BridgegenError');
    expect(error.code).toBe('X001');
    expect(error.message).toBe('went wrong');
    expect(error.details).toEqual({ file: 'a.idl' });
  });

  it('serializes to JSON', () => {
    const error = new BridgegenError('X001', 'went wrong');
    expect(error.toJSON()).toEqual({
      name: 'BridgegenError',
      code: 'X001',
      message: 'went wrong',
      details: undefined,
    });
  });
});

describe('error subclasses', () => {
  it.each([
    [GenerateError, 'GenerateError', ErrorCodes.DUPLICATE_OUTPUT],
    [ConfigError, 'ConfigError', ErrorCodes.INVALID_CONFIG],
    [SystemError, 'SystemError', ErrorCodes.PARSE_ERROR],
  ])('%o is named and extends BridgegenError', (ErrorClass, name, code) => {
    const error = new ErrorClass(code, 'message');
    expect(error).toBeInstanceOf(BridgegenError);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it('keeps generation errors distinguishable from config errors', () => {
    const error: BridgegenError = new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'missing');
    expect(error instanceof GenerateError).toBe(false);
  });
});

describe('ErrorCodes', () => {
  it('uses unique codes', () => {
    const codes = Object.values(ErrorCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('groups codes by prefix', () => {
    expect(ErrorCodes.FOLDER_BLOCKED).toBe('G001');
    expect(ErrorCodes.MISSING_SETTING).toBe('G008');
    expect(ErrorCodes.UNKNOWN_IDENT_STYLE).toBe('C003');
    expect(ErrorCodes.INVALID_DOCUMENT).toBe('S002');
  });
});
