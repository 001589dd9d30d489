/**
 * Unit tests for tool error classification
 */

import { describe, it, expect } from 'vitest';
import { GliffyToolError, createToolError, hasErrorCode } from '../../src/api/errors.js';

function errnoError(code: string, path?: string): Error {
  return Object.assign(new Error(`${code}: failure`), { code, path });
}

describe('createToolError', () => {
  it('should return GliffyToolError instances unchanged', () => {
    const error = new GliffyToolError('bad mapping', 'INVALID_MAPPING');
    expect(createToolError(error)).toBe(error);
  });

  it('should classify JSON syntax errors', () => {
    let thrown: unknown;
    try {
      JSON.parse('{');
    } catch (error) {
      thrown = error;
    }

    expect(createToolError(thrown).code).toBe('INVALID_JSON');
  });

  it('should classify missing files', () => {
    const error = createToolError(errnoError('ENOENT', '/tmp/missing.gliffy'));

    expect(error.code).toBe('FILE_NOT_FOUND');
    expect(error.message).toBe('File not found: /tmp/missing.gliffy');
    expect(error.details).toEqual({ path: '/tmp/missing.gliffy' });
  });

  it('should classify permission and disk errors', () => {
    expect(createToolError(errnoError('EACCES')).code).toBe('READ_ERROR');
    expect(createToolError(errnoError('ENOSPC')).code).toBe('WRITE_ERROR');
  });

  it('should wrap other values as UNKNOWN', () => {
    expect(createToolError(new Error('boom'))).toMatchObject({ code: 'UNKNOWN', message: 'boom' });
    expect(createToolError('plain')).toMatchObject({ code: 'UNKNOWN', message: 'plain' });
    expect(createToolError(42).details).toEqual({ originalError: '42' });
  });
});

describe('GliffyToolError', () => {
  it('should expose its code through is() and hasErrorCode()', () => {
    const error = new GliffyToolError('nope', 'WRITE_ERROR');

    expect(error.is('WRITE_ERROR')).toBe(true);
    expect(error.is('READ_ERROR')).toBe(false);
    expect(hasErrorCode(error, 'WRITE_ERROR')).toBe(true);
    expect(hasErrorCode(new Error('nope'), 'WRITE_ERROR')).toBe(false);
  });

  it('should provide a user message and a JSON form', () => {
    const error = new GliffyToolError('Invalid JSON', 'INVALID_JSON', { path: 'a.gliffy' });

    expect(error.getUserMessage()).toBe('The file is not valid JSON. Make sure it is a .gliffy export.');
    expect(error.toJSON()).toMatchObject({
      name: 'GliffyToolError',
      message: 'Invalid JSON',
      code: 'INVALID_JSON',
      details: { path: 'a.gliffy' },
    });
  });
});
