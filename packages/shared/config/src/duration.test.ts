import { describe, it, expect } from 'vitest';
import { parseDuration, tryParseDuration, formatDuration } from './duration.js';

describe('Duration Parsing', () => {
  describe('parseDuration', () => {
    it.each([
      ['30s', 30_000],
      ['250ms', 250],
      ['1m', 60_000],
      ['1h30m', 5_400_000],
      ['1.5h', 5_400_000],
      ['.5s', 500],
      ['1.s', 1000],
      ['2000us', 2],
      ['2000µs', 2],
      ['2000μs', 2],
      ['0', 0],
      ['+10s', 10_000],
      ['-5s', -5000],
      ['1m1s1ms', 61_001],
    ])('parses %s', (input, expected) => {
      expect(parseDuration(input)).toBe(expected);
    });

    it('parses nanoseconds as fractional milliseconds', () => {
      expect(parseDuration('1500000ns')).toBeCloseTo(1.5);
    });

    it('rejects empty input', () => {
      expect(() => parseDuration('')).toThrow('invalid duration ""');
      expect(() => parseDuration('-')).toThrow('invalid duration "-"');
    });

    it('rejects numbers without a unit', () => {
      expect(() => parseDuration('30')).toThrow('missing unit in duration "30"');
    });

    it('rejects unknown units', () => {
      expect(() => parseDuration('5d')).toThrow('unknown unit "d" in duration "5d"');
    });

    it('rejects a lone dot', () => {
      expect(() => parseDuration('.s')).toThrow('invalid duration ".s"');
    });

    it('rejects embedded whitespace', () => {
      expect(() => parseDuration('1h 30m')).toThrow('unknown unit "h " in duration "1h 30m"');
    });

    it('rejects durations beyond the representable range', () => {
      expect(() => parseDuration('3000000h')).toThrow('invalid duration "3000000h"');
    });
  });

  describe('tryParseDuration', () => {
    it('returns null instead of throwing', () => {
      expect(tryParseDuration('soon')).toBeNull();
      expect(tryParseDuration('2m')).toBe(120_000);
    });
  });

  describe('formatDuration', () => {
    it.each([
      [0, '0s'],
      [250, '250ms'],
      [30_000, '30s'],
      [1500, '1.5s'],
      [90_000, '1m30s'],
      [5_400_000, '1h30m0s'],
      [-5000, '-5s'],
    ])('formats %d as %s', (input, expected) => {
      expect(formatDuration(input)).toBe(expected);
    });
  });
});
