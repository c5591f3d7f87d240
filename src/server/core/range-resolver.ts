import { InvertedRangeError, LineOutOfBoundsError, OffsetOutOfBoundsError } from "./errors";

export type RangeUnit = "char" | "line";

/** End-exclusive range of absolute offsets (characters or lines). */
export interface AbsoluteRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Turn a requested range into absolute offsets against `total` units.
 *
 *  • a non-negative value is absolute
 *  • a negative value v means `total + v`
 *  • an end of exactly 0 means `total`, so (0,0) is everything and
 *    (-10,0) the last ten units
 *
 * Negative values are resolved first and then bounds-checked; nothing is
 * clamped.
 */
export function resolveRange(
  start: number,
  end: number,
  total: number,
  unit: RangeUnit = "char",
): AbsoluteRange {
  const absStart = resolveOffset(start, total, unit);
  const absEnd = end === 0 ? total : resolveOffset(end, total, unit);
  if (absStart > absEnd) throw new InvertedRangeError(start, end);
  return { start: absStart, end: absEnd };
}

export function resolveOffset(value: number, total: number, unit: RangeUnit = "char"): number {
  const absolute = value < 0 ? total + value : value;
  if (!Number.isInteger(value) || absolute < 0 || absolute > total) {
    throw unit === "line"
      ? new LineOutOfBoundsError(value, total)
      : new OffsetOutOfBoundsError(value, total);
  }
  return absolute;
}
