/**
 * Tests for Schema Validation Helpers
 */

import { describe, it, expect } from 'vitest';
import { Type } from '@sinclair/typebox';
import { validate, formatValidationErrors } from './validation.js';

const TargetSchema = Type.Object(
  {
    host: Type.String(),
    port: Type.Number(),
  },
  { additionalProperties: false }
);

describe('validate', () => {
  it('should return success for valid data', () => {
    const result = validate(TargetSchema, { host: '10.0.0.1', port: 4023 });

    expect(result).toEqual({ success: true, data: { host: '10.0.0.1', port: 4023 } });
  });

  it('should return errors with paths for invalid data', () => {
    const result = validate(TargetSchema, { host: '10.0.0.1', port: '4023' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.length).toBeGreaterThan(0);
      expect(result.errors[0]?.path).toBe('/port');
      expect(result.errors[0]?.received).toBe('4023');
      expect(result.errors[0]?.expected).toBe('number');
    }
  });

  it('should reject additional properties', () => {
    const result = validate(TargetSchema, { host: 'a', port: 1, extra: true });

    expect(result.success).toBe(false);
  });
});

describe('formatValidationErrors', () => {
  it('should join path and message pairs', () => {
    expect(
      formatValidationErrors([
        { path: '/a', expected: 'string', received: 1, message: 'Expected string' },
        { path: '', expected: 'object', received: null, message: 'Expected object' },
      ])
    ).toBe('/a: Expected string; /: Expected object');
  });
});
