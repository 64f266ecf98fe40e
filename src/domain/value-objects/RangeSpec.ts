import { RangeErrorKind, type RangeResult, rangeFailure } from './RangeError';

/**
 * Returned by accessors when the requested value has not been bound
 */
export const RANGE_UNCONSTRAINED = -1;

/**
 * A single range over a collection, as carried by the Range and
 * Content-Range headers (RFC 7233).
 *
 * The bound flags decide the shape of the range:
 * - suffix: first unbound, last bound to a negative count ("last N items")
 * - open-ended: first bound, last unbound ("from first to the end")
 * - fixed: both bound, inclusive
 *
 * Unbound shapes are resolved against a collection size with `constrain`.
 * Instances are mutable and carry no synchronization.
 */
export class RangeSpec {
  private _first = 0;
  private _last = 0;
  private firstBound = false;
  private lastBound = false;

  private _total = 0;
  private totalBound = false;

  constructor(public readonly units: string) {}

  /**
   * Creates a fixed range, binding first and then last
   */
  static create(units: string, first: number, last: number): RangeResult<RangeSpec> {
    const spec = new RangeSpec(units);
    const firstResult = spec.setFirst(first);
    if (!firstResult.success) {
      return firstResult;
    }
    return spec.setLast(last);
  }

  /**
   * Creates an open-ended range covering the whole collection (units=0-)
   */
  static fullRange(units: string): RangeSpec {
    const spec = new RangeSpec(units);
    spec._first = 0;
    spec.firstBound = true;
    return spec;
  }

  get first(): number {
    return this.firstBound ? this._first : RANGE_UNCONSTRAINED;
  }

  get last(): number {
    return this.lastBound ? this._last : RANGE_UNCONSTRAINED;
  }

  get total(): number {
    return this.totalBound ? this._total : RANGE_UNCONSTRAINED;
  }

  get hasTotal(): boolean {
    return this.totalBound;
  }

  setFirst(value: number): RangeResult<RangeSpec> {
    if (value < 0) {
      return rangeFailure(RangeErrorKind.IS_SUFFIX);
    }
    if (this.lastBound && value > this._last) {
      return rangeFailure(
        RangeErrorKind.INVALID,
        `first index ${value} must be <= last index ${this._last}`
      );
    }
    this._first = value;
    this.firstBound = true;
    return { success: true, value: this };
  }

  setLast(value: number): RangeResult<RangeSpec> {
    if (this.firstBound && value < this._first) {
      return rangeFailure(
        RangeErrorKind.INVALID,
        `last index ${value} must be >= first index ${this._first}`
      );
    }
    this._last = value;
    this.lastBound = true;
    return { success: true, value: this };
  }

  offset(): number {
    return this.first;
  }

  /**
   * Distance between first and last for a fixed range, or the requested
   * length of a suffix range
   */
  limit(): number {
    if (this.isFixed()) {
      return this._last - this._first;
    }
    if (this.lastBound && this._last <= 0) {
      return 0 - this._last;
    }
    return RANGE_UNCONSTRAINED;
  }

  isSuffix(): boolean {
    return !this.firstBound;
  }

  isFixed(): boolean {
    return this.firstBound && this.lastBound;
  }

  isUnbounded(): boolean {
    return !this.firstBound || !this.lastBound;
  }

  isFullRange(): boolean {
    return this.firstBound && this._first === 0 && !this.lastBound;
  }

  /**
   * True once a suffix has been resolved against an empty collection
   */
  isEmpty(): boolean {
    return !this.firstBound && this.lastBound && this._last === 0;
  }

  /**
   * A negative offset counts from the end of the collection.
   */
  contains(offset: number): boolean {
    if (offset < 0) {
      if (!this.firstBound) {
        return false;
      }
      return this._last >= -offset;
    }
    if (!this.firstBound || !this.lastBound) {
      return false;
    }
    return this._first <= offset && offset <= this._last;
  }

  /**
   * Resolves the range against a collection of `size` elements, in place
   */
  constrain(size: number): RangeResult<RangeSpec> {
    if (!Number.isSafeInteger(size) || size < 0) {
      return rangeFailure(RangeErrorKind.INVALID, `collection size must be a non-negative integer, got ${size}`);
    }

    if (size === 0) {
      if (!this.firstBound) {
        this._last = 0;
        this.lastBound = true;
        return { success: true, value: this };
      }
      return rangeFailure(RangeErrorKind.UNSATISFIABLE_ZERO_LENGTH);
    }

    if (!this.firstBound) {
      return this.resolveSuffix(size);
    }

    if (this._first > size - 1) {
      return rangeFailure(
        RangeErrorKind.OUTSIDE_CONSTRAINTS,
        `range begins at ${this._first}, outside of ${size} elements`
      );
    }

    if (!this.lastBound || this._last > size - 1) {
      this._last = size - 1;
      this.lastBound = true;
    }

    return { success: true, value: this };
  }

  /**
   * Binds first for a range whose first index is unbound, given size > 0.
   * A negative last is a suffix length, a non-negative last an end index.
   */
  private resolveSuffix(size: number): RangeResult<RangeSpec> {
    if (!this.lastBound) {
      this._first = 0;
      this._last = size - 1;
    } else if (this._last < 0) {
      this._first = Math.max(size + this._last, 0);
      this._last = size - 1;
    } else if (this._last === 0) {
      // zero-length suffix
      return rangeFailure(RangeErrorKind.UNSATISFIABLE_ZERO_LENGTH);
    } else {
      this._first = 0;
      this._last = Math.min(this._last, size - 1);
    }
    this.firstBound = true;
    this.lastBound = true;
    return { success: true, value: this };
  }

  /**
   * Constrains the range to `total` and records it as the collection size
   */
  setTotal(total: number): RangeResult<RangeSpec> {
    const result = this.constrain(total);
    if (!result.success) {
      return result;
    }
    this._total = total;
    this.totalBound = true;
    return result;
  }

  /**
   * Renders the body of a Content-Range header
   *
   * @example "resources 100-199/200", "resources 0-9/*"
   */
  format(): RangeResult<string> {
    const max = this.totalBound ? String(this._total) : '*';

    if (!this.firstBound && !this.lastBound) {
      return { success: true, value: `${this.units} */${max}` };
    }

    if (!this.firstBound || !this.lastBound) {
      return rangeFailure(
        RangeErrorKind.UNBOUND,
        `range must be fully resolved before formatting (first bound: ${this.firstBound}, last bound: ${this.lastBound})`
      );
    }

    return { success: true, value: `${this.units} ${this._first}-${this._last}/${max}` };
  }
}
