/**
 * Unit tests for RangeParser
 */

import { describe, it, expect } from 'vitest';
import { RangeParser } from './RangeParser';
import { RangeErrorKind } from '../../domain/value-objects/RangeError';
import { RANGE_UNCONSTRAINED } from '../../domain/value-objects/RangeSpec';

function parseOk(range: string) {
  const result = RangeParser.parse(range);
  if (!result.success) {
    throw new Error(`Expected '${range}' to parse, got ${result.error}: ${result.message}`);
  }
  return result.value;
}

function parseError(range: string): RangeErrorKind {
  const result = RangeParser.parse(range);
  if (result.success) {
    throw new Error(`Expected '${range}' to be rejected`);
  }
  return result.error;
}

describe('RangeParser', () => {
  describe('valid ranges', () => {
    it('should parse a suffix range', () => {
      const spec = parseOk('resources=-100');

      expect(spec.units).toBe('resources');
      expect(spec.isSuffix()).toBe(true);
      expect(spec.isUnbounded()).toBe(true);
      expect(spec.first).toBe(RANGE_UNCONSTRAINED);
      expect(spec.last).toBe(-100);
      expect(spec.limit()).toBe(100);
    });

    it('should parse an open-ended range', () => {
      const spec = parseOk('resources=100-');

      expect(spec.isSuffix()).toBe(false);
      expect(spec.isUnbounded()).toBe(true);
      expect(spec.offset()).toBe(100);
      expect(spec.first).toBe(100);
      expect(spec.last).toBe(RANGE_UNCONSTRAINED);
      expect(spec.limit()).toBe(RANGE_UNCONSTRAINED);
    });

    it('should parse a start without separator as open-ended', () => {
      const spec = parseOk('resources=7');

      expect(spec.first).toBe(7);
      expect(spec.last).toBe(RANGE_UNCONSTRAINED);
    });

    it('should parse a fixed range', () => {
      const spec = parseOk('resources=100-199');

      expect(spec.isUnbounded()).toBe(false);
      expect(spec.isSuffix()).toBe(false);
      expect(spec.offset()).toBe(100);
      expect(spec.first).toBe(100);
      expect(spec.last).toBe(199);
    });

    it('should parse a single-element range', () => {
      const spec = parseOk('bytes=5-5');

      expect(spec.first).toBe(5);
      expect(spec.last).toBe(5);
    });

    it('should keep any unit token verbatim', () => {
      expect(parseOk('bytes=0-1').units).toBe('bytes');
      expect(parseOk('x-custom.items=0-1').units).toBe('x-custom.items');
    });

    it('should treat -0 as a zero start', () => {
      const spec = parseOk('bytes=-0');

      expect(spec.isFullRange()).toBe(true);
    });
  });

  describe('formatting parsed ranges', () => {
    it('should format a suffix range after setting the total', () => {
      const spec = parseOk('resources=-100');
      expect(spec.format().success).toBe(false);

      expect(spec.setTotal(200).success).toBe(true);
      expect(spec.format()).toEqual({ success: true, value: 'resources 100-199/200' });
    });

    it('should format an open-ended range after setting the total', () => {
      const spec = parseOk('resources=100-');
      expect(spec.format().success).toBe(false);

      expect(spec.setTotal(300).success).toBe(true);
      expect(spec.format()).toEqual({ success: true, value: 'resources 100-299/300' });
    });

    it('should format a fixed range with and without total', () => {
      const spec = parseOk('resources=100-199');
      expect(spec.format()).toEqual({ success: true, value: 'resources 100-199/*' });

      expect(spec.setTotal(200).success).toBe(true);
      expect(spec.format()).toEqual({ success: true, value: 'resources 100-199/200' });
    });
  });

  describe('invalid ranges', () => {
    it('should reject input without a unit separator', () => {
      expect(parseError('resources')).toBe(RangeErrorKind.INVALID);
      expect(parseError('')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject an empty unit', () => {
      expect(parseError('=0-10')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject an empty range value', () => {
      expect(parseError('bytes=')).toBe(RangeErrorKind.INVALID);
      expect(parseError('bytes=-')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject multiple ranges', () => {
      const result = RangeParser.parse('bytes=0-50,100-150');

      expect(result).toEqual({
        success: false,
        error: RangeErrorKind.INVALID,
        message: 'Multiple ranges are not supported'
      });
    });

    it('should reject last < first', () => {
      expect(parseError('bytes=10-5')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject a negative last index', () => {
      expect(parseError('bytes=0--5')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject a suffix followed by more input', () => {
      expect(parseError('bytes=-100-200')).toBe(RangeErrorKind.IS_SUFFIX);
    });

    it('should reject trailing input', () => {
      expect(parseError('bytes=0-10x')).toBe(RangeErrorKind.INVALID);
      expect(parseError('bytes=5x')).toBe(RangeErrorKind.INVALID);
      expect(parseError('bytes=0-10-20')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject non-numeric and whitespace-padded values', () => {
      expect(parseError('bytes=abc')).toBe(RangeErrorKind.INVALID);
      expect(parseError('bytes= 0-10')).toBe(RangeErrorKind.INVALID);
      expect(parseError('bytes=1.5-2')).toBe(RangeErrorKind.INVALID);
    });

    it('should reject values beyond the safe integer range', () => {
      const result = RangeParser.parse('bytes=0-99999999999999999999');

      expect(result).toEqual({
        success: false,
        error: RangeErrorKind.INVALID,
        message: "Range value out of bounds: '99999999999999999999'"
      });
    });
  });
});
