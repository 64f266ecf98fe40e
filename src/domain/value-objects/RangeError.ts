/**
 * Classified failures of range parsing, constraint and formatting
 */
export enum RangeErrorKind {
  IS_SUFFIX = 'RANGE_IS_SUFFIX',
  INVALID = 'RANGE_INVALID',
  UNSATISFIABLE_ZERO_LENGTH = 'RANGE_UNSATISFIABLE_ZERO_LENGTH',
  OUTSIDE_CONSTRAINTS = 'RANGE_OUTSIDE_CONSTRAINTS',
  UNBOUND = 'RANGE_UNBOUND'
}

export const RANGE_ERROR_MESSAGES: Readonly<Record<RangeErrorKind, string>> = {
  [RangeErrorKind.IS_SUFFIX]:
    'first index in range is negative, indicating a suffix -- no last index may be supplied',
  [RangeErrorKind.INVALID]: 'first index in range must be <= last index',
  [RangeErrorKind.UNSATISFIABLE_ZERO_LENGTH]: 'range can satisfy a zero-length set',
  [RangeErrorKind.OUTSIDE_CONSTRAINTS]: 'range begins outside of the total number of elements',
  [RangeErrorKind.UNBOUND]: 'range must be fully resolved before it can be formatted'
};

export interface RangeFailure {
  success: false;
  error: RangeErrorKind;
  message: string;
}

/**
 * Result type for range operations
 */
export type RangeResult<T> = { success: true; value: T } | RangeFailure;

export function rangeFailure(error: RangeErrorKind, message: string = RANGE_ERROR_MESSAGES[error]): RangeFailure {
  return { success: false, error, message };
}
