/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  AddonLintError,
  ConfigError,
  SystemError,
  ExtractionError,
  ScopeDetectionError,
  ErrorCodes,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('AddonLintError', () => {
  it('should create error with code and message', () => {
    const error = new AddonLintError('E001', 'Test error message');

    expect(error.code).toBe('E001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('AddonLintError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON with details', () => {
    const error = new AddonLintError('E001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'AddonLintError',
      code: 'E001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });

  it('should leave details undefined when not given', () => {
    expect(new AddonLintError('E001', 'Test').toJSON().details).toBeUndefined();
  });
});

describe('subclasses', () => {
  it('should name each subclass and keep the base class', () => {
    const errors = [
      new ConfigError(ErrorCodes.CONFIG_LOAD, 'config'),
      new SystemError(ErrorCodes.FILE_NOT_FOUND, 'system'),
      new ExtractionError(ErrorCodes.PARSE_ERROR, 'parse'),
      new ScopeDetectionError(ErrorCodes.GIT_FAILED, 'git'),
    ];

    expect(errors.map((e) => e.name)).toEqual([
      'ConfigError',
      'SystemError',
      'ExtractionError',
      'ScopeDetectionError',
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(AddonLintError);
    }
  });

  it('should carry the line of a parse error', () => {
    const error = new ExtractionError(ErrorCodes.PARSE_ERROR, 'unexpected token', 12);

    expect(error.line).toBe(12);
    expect(error.code).toBe('S001');
  });

  it('should default the parse error line to null', () => {
    expect(new ExtractionError(ErrorCodes.PARSE_ERROR, 'bad').line).toBeNull();
  });
});

describe('errorMessage', () => {
  it('should take the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
