import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode, type Severity } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES).length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are within valid 1-255 range', () => {
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('distribution and configuration codes map to distinct exits', () => {
    expect(ErrorCode.INVALID_DISTRIBUTION_SPEC).toBe('E100');
    expect(getExitCode(ErrorCode.INVALID_DISTRIBUTION_SPEC)).toBe(10);
    expect(getExitCode(ErrorCode.TEMPLATE_LOAD_FAILED)).toBe(31);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'error';
    expect(sev).toBe('error');
  });
});
