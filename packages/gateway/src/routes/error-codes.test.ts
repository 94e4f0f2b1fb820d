import { describe, it, expect } from 'vitest';
import { ERROR_CODES, isValidErrorCode } from './error-codes.js';

describe('ERROR_CODES', () => {
  it('uses each key as its own value', () => {
    for (const [key, value] of Object.entries(ERROR_CODES)) {
      expect(value).toBe(key);
    }
  });

  it('covers the plan API failures', () => {
    expect(ERROR_CODES.PLAN_INVALID).toBe('PLAN_INVALID');
    expect(ERROR_CODES.ALREADY_EXISTS).toBe('ALREADY_EXISTS');
    expect(ERROR_CODES.NOT_RUNNING).toBe('NOT_RUNNING');
  });
});

describe('isValidErrorCode', () => {
  it('accepts known codes', () => {
    expect(isValidErrorCode('NOT_FOUND')).toBe(true);
    expect(isValidErrorCode('PAYLOAD_TOO_LARGE')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isValidErrorCode('not_found')).toBe(false);
    expect(isValidErrorCode('')).toBe(false);
  });
});
