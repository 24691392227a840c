import { TemporalError } from "../error.ts";

export const TICKS_PER_MILLISECOND = 10_000n;
export const TICKS_PER_SECOND = 1_000n * TICKS_PER_MILLISECOND;
export const TICKS_PER_MINUTE = 60n * TICKS_PER_SECOND;
export const TICKS_PER_HOUR = 60n * TICKS_PER_MINUTE;
export const TICKS_PER_DAY = 24n * TICKS_PER_HOUR;
/** Postgres counts a month as 30 days when it reduces an interval to a single length */
export const DAYS_PER_MONTH = 30;

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;
const FRACTION_DIGITS = 7;

const TIME_RE = /^([+-])?(\d+):(\d{1,2})(?::(\d{1,2})(?:\.(\d+))?)?$/;
const UNIT_RE = /^(years?|mons?|days?)$/;

interface TimeParts {
  negative: boolean;
  hours: number;
  minutes: number;
  seconds: number;
  fraction: string;
}

function matchTime(value: string): TimeParts | null {
  const matches = TIME_RE.exec(value);
  if (!matches) {
    return null;
  }
  return {
    negative: matches[1] === "-",
    hours: parseInt(matches[2], 10),
    minutes: parseInt(matches[3], 10),
    seconds: parseInt(matches[4] ?? "0", 10),
    fraction: matches[5] ?? "",
  };
}

function timePartsToTicks(value: string, parts: TimeParts): bigint {
  if (parts.minutes > 59 || parts.seconds > 59) {
    throw new TemporalError(
      "Overflow",
      `Invalid time: "${value}". Minutes and seconds must be below 60`,
    );
  }
  if (parts.fraction.length > FRACTION_DIGITS) {
    throw new TemporalError(
      "Overflow",
      `Invalid time: "${value}". At most ${FRACTION_DIGITS} fractional digits are supported`,
    );
  }

  const ticks = BigInt(parts.hours) * TICKS_PER_HOUR +
    BigInt(parts.minutes) * TICKS_PER_MINUTE +
    BigInt(parts.seconds) * TICKS_PER_SECOND +
    BigInt(parts.fraction.padEnd(FRACTION_DIGITS, "0"));
  return parts.negative ? -ticks : ticks;
}

function fromMillisecondsOf(value: number, scale: number): Interval {
  if (!Number.isFinite(value)) {
    throw new TemporalError(
      "InvalidArgument",
      `Interval length "${value}" must be a finite number`,
    );
  }
  const milliseconds = Math.round(value * scale);
  return Interval.fromTicks(BigInt(milliseconds) * TICKS_PER_MILLISECOND);
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

function plural(value: number, unit: string): string {
  return `${value} ${unit}${value === 1 || value === -1 ? "" : "s"}`;
}

/**
 * A Postgres interval: a number of months, a number of days and a time part
 * counted in ticks of 100 nanoseconds
 *
 * https://www.postgresql.org/docs/current/datatype-datetime.html#DATATYPE-INTERVAL-INPUT
 */
export class Interval {
  static readonly Zero = new Interval(0, 0, 0n);

  constructor(
    readonly months: number,
    readonly days: number,
    readonly ticks: bigint,
  ) {}

  static fromTicks(ticks: bigint): Interval {
    return new Interval(0, 0, ticks);
  }

  /**
   * Fractional lengths are rounded to the nearest millisecond
   */
  static fromDays(days: number): Interval {
    return fromMillisecondsOf(days, MS_PER_DAY);
  }

  static fromHours(hours: number): Interval {
    return fromMillisecondsOf(hours, MS_PER_HOUR);
  }

  static fromMinutes(minutes: number): Interval {
    return fromMillisecondsOf(minutes, MS_PER_MINUTE);
  }

  static fromSeconds(seconds: number): Interval {
    return fromMillisecondsOf(seconds, MS_PER_SECOND);
  }

  static fromMilliseconds(milliseconds: number): Interval {
    return fromMillisecondsOf(milliseconds, 1);
  }

  /**
   * Parses the Postgres output format, e.g. `1 year 2 mons 3 days 04:05:06`
   *
   * Throws a TemporalError of kind `FormatError` for unrecognized text and of
   * kind `Overflow` when a time component is out of range
   */
  static parse(value: string): Interval {
    const tokens = value.trim().toLowerCase().split(/\s+/);
    let months = 0;
    let days = 0;
    let ticks = 0n;
    let i = 0;

    while (i < tokens.length) {
      const token = tokens[i];
      const unit = tokens[i + 1];
      if (/^[+-]?\d+$/.test(token) && unit && UNIT_RE.test(unit)) {
        const amount = parseInt(token, 10);
        if (unit.startsWith("year")) {
          months += amount * 12;
        } else if (unit.startsWith("mon")) {
          months += amount;
        } else {
          days += amount;
        }
        i += 2;
        continue;
      }

      const time = matchTime(token);
      if (time && i === tokens.length - 1) {
        ticks = timePartsToTicks(value, time);
        i++;
        continue;
      }

      throw new TemporalError("FormatError", `Invalid interval: "${value}"`);
    }

    return new Interval(months, days, ticks);
  }

  /**
   * The whole length in ticks, with months counted as 30 days
   */
  get totalTicks(): bigint {
    return this.ticks +
      BigInt(this.days + this.months * DAYS_PER_MONTH) * TICKS_PER_DAY;
  }

  /**
   * Hours of the time part, which may exceed 23
   */
  get hours(): number {
    return Number(this.ticks / TICKS_PER_HOUR);
  }

  get minutes(): number {
    return Number((this.ticks / TICKS_PER_MINUTE) % 60n);
  }

  get seconds(): number {
    return Number((this.ticks / TICKS_PER_SECOND) % 60n);
  }

  get milliseconds(): number {
    return Number((this.ticks / TICKS_PER_MILLISECOND) % 1000n);
  }

  negate(): Interval {
    return new Interval(-this.months, -this.days, -this.ticks);
  }

  add(other: Interval): Interval {
    return new Interval(
      this.months + other.months,
      this.days + other.days,
      this.ticks + other.ticks,
    );
  }

  subtract(other: Interval): Interval {
    return this.add(other.negate());
  }

  compareTo(other: Interval): number {
    const a = this.totalTicks;
    const b = other.totalTicks;
    return a === b ? 0 : a < b ? -1 : 1;
  }

  equals(other: Interval): boolean {
    return this.totalTicks === other.totalTicks;
  }

  /**
   * Renders the time part alone as `HH:MM:SS[.fffffff]`
   */
  formatTime(): string {
    const ticks = abs(this.ticks);
    const hours = ticks / TICKS_PER_HOUR;
    const minutes = (ticks / TICKS_PER_MINUTE) % 60n;
    const seconds = (ticks / TICKS_PER_SECOND) % 60n;
    const fraction = String(ticks % TICKS_PER_SECOND)
      .padStart(FRACTION_DIGITS, "0")
      .replace(/0+$/, "");

    const time = `${String(hours).padStart(2, "0")}:${
      String(minutes).padStart(2, "0")
    }:${String(seconds).padStart(2, "0")}${fraction ? `.${fraction}` : ""}`;
    return this.ticks < 0n ? `-${time}` : time;
  }

  toString(): string {
    const parts: string[] = [];
    const years = Math.trunc(this.months / 12);
    const months = this.months % 12;

    if (years !== 0) parts.push(plural(years, "year"));
    if (months !== 0) parts.push(plural(months, "mon"));
    if (this.days !== 0) parts.push(plural(this.days, "day"));
    if (this.ticks !== 0n || parts.length === 0) parts.push(this.formatTime());

    return parts.join(" ");
  }
}

/**
 * Parses a time of day, `H:MM[:SS[.fffffff]]`
 *
 * Throws a TemporalError of kind `FormatError` for unrecognized text and of
 * kind `Overflow` when a component is out of range, hours included
 */
export function parseTimeOfDay(value: string): Interval {
  const time = matchTime(value.trim());
  if (!time || time.negative) {
    throw new TemporalError("FormatError", `Invalid time: "${value}"`);
  }
  if (time.hours > 23) {
    throw new TemporalError(
      "Overflow",
      `Invalid time: "${value}". Hours must be below 24`,
    );
  }
  return Interval.fromTicks(timePartsToTicks(value, time));
}
