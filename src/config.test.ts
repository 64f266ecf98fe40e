/**
 * Unit tests for configuration parsing
 */

import { describe, it, expect } from 'vitest';
import { parsePositiveInteger } from './config';

describe('parsePositiveInteger', () => {
  it('should accept a positive integer', () => {
    expect(parsePositiveInteger('25', 100)).toBe(25);
  });

  it('should fall back when the variable is unset or empty', () => {
    expect(parsePositiveInteger(undefined, 100)).toBe(100);
    expect(parsePositiveInteger('', 100)).toBe(100);
  });

  it('should fall back for zero and negative values', () => {
    expect(parsePositiveInteger('0', 100)).toBe(100);
    expect(parsePositiveInteger('-5', 100)).toBe(100);
  });

  it('should fall back for fractional and non-numeric values', () => {
    expect(parsePositiveInteger('2.5', 100)).toBe(100);
    expect(parsePositiveInteger('many', 100)).toBe(100);
  });
});
