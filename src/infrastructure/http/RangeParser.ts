import { RangeSpec } from '../../domain/value-objects/RangeSpec';
import { RangeErrorKind, rangeFailure } from '../../domain/value-objects/RangeError';
import type { RangeResult } from '../../domain/value-objects/RangeError';

/**
 * Parses HTTP Range header strings into RangeSpec values.
 *
 * Only a single range is supported, without parameters:
 *
 *   resources=-100   last 100 resources (suffix range)
 *   resources=0-99   resources [0, 99]
 *   resources=100-   resources from index 100 to the end
 */
export class RangeParser {
  private static readonly UNITS_SEPARATOR = '=';
  private static readonly MULTIPLE_RANGE_SEPARATOR = ',';
  // Leading range value, optionally signed, and whatever follows it
  private static readonly FIRST_VALUE = /^(-?\d+)(.*)$/s;
  // Separator and an optional last value
  private static readonly LAST_VALUE = /^-(\d*)$/;

  static parse(range: string): RangeResult<RangeSpec> {
    const separatorIndex = range.indexOf(this.UNITS_SEPARATOR);
    if (separatorIndex === -1) {
      return rangeFailure(RangeErrorKind.INVALID, `Missing '=' between range unit and value in '${range}'`);
    }

    const units = range.substring(0, separatorIndex);
    if (!units) {
      return rangeFailure(RangeErrorKind.INVALID, `Missing range unit in '${range}'`);
    }

    const rangeValue = range.substring(separatorIndex + 1);
    if (rangeValue.includes(this.MULTIPLE_RANGE_SEPARATOR)) {
      return rangeFailure(RangeErrorKind.INVALID, 'Multiple ranges are not supported');
    }

    const firstMatch = this.FIRST_VALUE.exec(rangeValue);
    if (!firstMatch) {
      return rangeFailure(RangeErrorKind.INVALID, `Invalid range value: '${rangeValue}'`);
    }

    const first = this.toRangeValue(firstMatch[1]);
    if (first === null) {
      return rangeFailure(RangeErrorKind.INVALID, `Range value out of bounds: '${firstMatch[1]}'`);
    }
    const rest = firstMatch[2];
    const spec = new RangeSpec(units);

    // Case 1: units=-SUFFIX
    if (first < 0) {
      if (rest) {
        return rangeFailure(RangeErrorKind.IS_SUFFIX);
      }
      return spec.setLast(first);
    }

    const firstResult = spec.setFirst(first);
    if (!firstResult.success) {
      return firstResult;
    }

    // Case 2: units=START
    if (!rest) {
      return firstResult;
    }

    const lastMatch = this.LAST_VALUE.exec(rest);
    if (!lastMatch) {
      return rangeFailure(RangeErrorKind.INVALID, `Unexpected input after range start: '${rest}'`);
    }

    // Case 3: units=START-
    if (!lastMatch[1]) {
      return firstResult;
    }

    // Case 4: units=START-END
    const last = this.toRangeValue(lastMatch[1]);
    if (last === null) {
      return rangeFailure(RangeErrorKind.INVALID, `Range value out of bounds: '${lastMatch[1]}'`);
    }
    return spec.setLast(last);
  }

  private static toRangeValue(digits: string): number | null {
    const value = Number(digits);
    if (!Number.isSafeInteger(value)) {
      return null;
    }
    // "-0" is a zero start, not a suffix
    return value === 0 ? 0 : value;
  }
}
