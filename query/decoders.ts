import { unwrap } from "../error.ts";
import { Circle } from "../types/circle.ts";
import { PgDate } from "../types/date.ts";
import { Interval } from "../types/interval.ts";
import { Timestamp } from "../types/timestamp.ts";

export function decodeCircle(value: string): Circle {
  return Circle.parse(value);
}

export function decodeDate(value: string): PgDate {
  return PgDate.parse(value);
}

/**
 * Handles both `timestamp` and `timestamptz`, the latter comes with a UTC
 * offset and is read as a UTC value:
 * 1997-12-17 07:37:16-08
 */
export function decodeTimestamp(value: string): Timestamp {
  return unwrap(Timestamp.parse(value));
}

export function decodeInterval(value: string): Interval {
  return Interval.parse(value);
}

export function decodeFloat(value: string): number {
  return parseFloat(value);
}
