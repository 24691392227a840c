import { err, ok, type Result, TemporalError } from "../error.ts";
import { getStandardUtcOffset } from "../utils/utils.ts";
import { PgDate } from "./date.ts";
import {
  Interval,
  parseTimeOfDay,
  TICKS_PER_DAY,
  TICKS_PER_HOUR,
  TICKS_PER_MILLISECOND,
  TICKS_PER_MINUTE,
  TICKS_PER_SECOND,
} from "./interval.ts";

const TIMEZONE_RE = /(z|[+-]\d{2}(?::?\d{2}){0,2})$/;

/**
 * How the clock reading of a finite timestamp is anchored: not at all, to
 * UTC or to the host time zone
 */
export type Disposition = "unspecified" | "utc" | "local";

export type TimestampKind = "finite" | "infinity" | "-infinity";

const RANK: Record<TimestampKind, number> = {
  "-infinity": -1,
  finite: 0,
  infinity: 1,
};

function floorDiv(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? quotient - 1n : quotient;
}

function localOffsetTicks(): bigint {
  return BigInt(getStandardUtcOffset()) * TICKS_PER_MINUTE;
}

/**
 * Offset in ticks east of UTC for `Z`, `-05`, `+06:30` or `+06:30:10`
 */
function decodeTimezoneOffset(zone: string): bigint {
  if (zone === "z") {
    return 0n;
  }
  const parts: string[] = zone.slice(1).match(/\d{2}/g) ?? [];
  const [hours, minutes = "0", seconds = "0"] = parts;
  const offset = BigInt(parseInt(hours, 10)) * TICKS_PER_HOUR +
    BigInt(parseInt(minutes, 10)) * TICKS_PER_MINUTE +
    BigInt(parseInt(seconds, 10)) * TICKS_PER_SECOND;
  return zone.startsWith("-") ? -offset : offset;
}

function compareTimestamps(a: BaseTimestamp, b: BaseTimestamp): number {
  if (a instanceof FiniteTimestamp && b instanceof FiniteTimestamp) {
    const cmp = a.date.compareTo(b.date);
    return cmp === 0 ? a.time.compareTo(b.time) : cmp;
  }
  return Math.sign(RANK[a.kind] - RANK[b.kind]);
}

/**
 * Operations shared by every timestamp, finite or not
 */
abstract class BaseTimestamp {
  abstract readonly kind: TimestampKind;
  /**
   * Always `unspecified` for the infinity sentinels
   */
  abstract readonly disposition: Disposition;

  /**
   * Infinity absorbs additions: a sentinel is returned unchanged
   */
  abstract addTicks(ticks: bigint): Timestamp;
  abstract addYears(years: number): Timestamp;
  abstract addMonths(months: number): Timestamp;
  /**
   * Unspecified and local values are read as local time and tagged `utc`
   */
  abstract toUniversalTime(): Timestamp;
  /**
   * Unspecified and UTC values are read as UTC and tagged `local`
   */
  abstract toLocalTime(): Timestamp;
  /**
   * Converts to a native Date, which can't hold infinity nor years outside
   * 1 to 9999
   */
  abstract toDate(): Result<Date>;
  abstract toString(): string;

  isInfinity(): boolean {
    return this.kind === "infinity";
  }

  isNegativeInfinity(): boolean {
    return this.kind === "-infinity";
  }

  isFinite(): this is FiniteTimestamp {
    return this instanceof FiniteTimestamp;
  }

  add(interval: Interval): Timestamp {
    return this.addTicks(interval.totalTicks);
  }

  addDays(days: number): Timestamp {
    return this.add(Interval.fromDays(days));
  }

  addHours(hours: number): Timestamp {
    return this.add(Interval.fromHours(hours));
  }

  addMinutes(minutes: number): Timestamp {
    return this.add(Interval.fromMinutes(minutes));
  }

  addSeconds(seconds: number): Timestamp {
    return this.add(Interval.fromSeconds(seconds));
  }

  /**
   * The value is rounded to the nearest millisecond
   */
  addMilliseconds(milliseconds: number): Timestamp {
    return this.add(Interval.fromMilliseconds(milliseconds));
  }

  /**
   * Rebuilds the value from its tick count, carrying a time of day of a day
   * or more over into the date
   */
  normalize(): Timestamp {
    return this.add(Interval.Zero);
  }

  subtract(interval: Interval): Timestamp;
  subtract(timestamp: Timestamp): Result<Interval>;
  subtract(operand: Interval | Timestamp): Timestamp | Result<Interval> {
    if (operand instanceof Interval) {
      return this.add(operand.negate());
    }
    if (!(this instanceof FiniteTimestamp) || !operand.isFinite()) {
      return err("InvalidOperation", "You cannot subtract infinity timestamps");
    }
    return ok(
      new Interval(
        0,
        this.date.daysSinceEra - operand.date.daysSinceEra,
        this.time.ticks - operand.time.ticks,
      ),
    );
  }

  /**
   * Orders negative infinity before every finite value and infinity after
   * them. Finite values compare by date and then by time of day, whatever
   * their disposition
   */
  compareTo(other: unknown): Result<number> {
    if (other === null || other === undefined) {
      return ok(1);
    }
    if (!(other instanceof BaseTimestamp)) {
      return err("InvalidArgument", "Timestamps can only be compared to timestamps");
    }
    return ok(compareTimestamps(this, other));
  }

  equals(other: Timestamp): boolean {
    return compareTimestamps(this, other) === 0;
  }
}

export class FiniteTimestamp extends BaseTimestamp {
  readonly kind = "finite";
  /**
   * Time of day in ticks only, days and months of the given interval are
   * folded into it
   */
  readonly time: Interval;

  constructor(
    readonly date: PgDate,
    time: Interval,
    readonly disposition: Disposition = "unspecified",
  ) {
    super();
    this.time = time.months === 0 && time.days === 0
      ? time
      : Interval.fromTicks(time.totalTicks);
  }

  /**
   * Ticks of 100 nanoseconds since 0001-01-01 00:00:00
   */
  get ticks(): bigint {
    return BigInt(this.date.daysSinceEra) * TICKS_PER_DAY +
      this.time.totalTicks;
  }

  get year(): number {
    return this.date.year;
  }

  get month(): number {
    return this.date.month;
  }

  get day(): number {
    return this.date.day;
  }

  get dayOfYear(): number {
    return this.date.dayOfYear;
  }

  get dayOfWeek(): number {
    return this.date.dayOfWeek;
  }

  get isLeapYear(): boolean {
    return this.date.isLeapYear;
  }

  get hours(): number {
    return this.time.hours;
  }

  get minutes(): number {
    return this.time.minutes;
  }

  get seconds(): number {
    return this.time.seconds;
  }

  get milliseconds(): number {
    return this.time.milliseconds;
  }

  addTicks(ticks: bigint): Timestamp {
    return fromTicks(this.ticks + ticks, this.disposition);
  }

  addYears(years: number): Timestamp {
    return new FiniteTimestamp(
      this.date.addYears(years),
      this.time,
      this.disposition,
    );
  }

  addMonths(months: number): Timestamp {
    return new FiniteTimestamp(
      this.date.addMonths(months),
      this.time,
      this.disposition,
    );
  }

  toUniversalTime(): Timestamp {
    if (this.disposition === "utc") {
      return this;
    }
    return fromTicks(this.ticks - localOffsetTicks(), "utc");
  }

  toLocalTime(): Timestamp {
    if (this.disposition === "local") {
      return this;
    }
    return fromTicks(this.ticks + localOffsetTicks(), "local");
  }

  toDate(): Result<Date> {
    const { year, month, day } = this.date;
    if (year < 1 || year > 9999) {
      return err(
        "InvalidCast",
        "Out of the range of Date (year must be between 1 and 9999)",
      );
    }

    const milliseconds = Number(this.time.totalTicks / TICKS_PER_MILLISECOND);
    // `Date` maps two digit years to the 20th century, setting the full year
    // afterwards keeps first century dates intact
    const date = new Date(0);
    if (this.disposition === "local") {
      date.setFullYear(year, month - 1, day);
      date.setHours(0, 0, 0, milliseconds);
    } else {
      date.setUTCFullYear(year, month - 1, day);
      date.setUTCHours(0, 0, 0, milliseconds);
    }
    return ok(date);
  }

  /**
   * Renders `YYYY-MM-DD HH:MM:SS[.fffffff]`, followed by ` BC` for dates
   * before the common era
   */
  toString(): string {
    const [date, era] = this.date.toString().split(" ");
    const text = `${date} ${this.time.formatTime()}`;
    return era ? `${text} ${era}` : text;
  }
}

export class InfiniteTimestamp extends BaseTimestamp {
  readonly disposition: Disposition = "unspecified";

  constructor(readonly kind: "infinity" | "-infinity") {
    super();
  }

  addTicks(_ticks: bigint): Timestamp {
    return this;
  }

  addYears(_years: number): Timestamp {
    return this;
  }

  addMonths(_months: number): Timestamp {
    return this;
  }

  toUniversalTime(): Timestamp {
    return this;
  }

  toLocalTime(): Timestamp {
    return this;
  }

  toDate(): Result<Date> {
    return err(
      "InvalidCast",
      "Can't convert infinite timestamp values to Date",
    );
  }

  toString(): string {
    return this.kind;
  }
}

/**
 * A Postgres `timestamp` or `timestamptz` value. Unlike `Date` it covers
 * 4713 BC to 5874897 AD and holds the special `infinity` and `-infinity`
 * values
 *
 * https://www.postgresql.org/docs/current/datatype-datetime.html#DATATYPE-DATETIME-SPECIAL-VALUES
 */
export type Timestamp = FiniteTimestamp | InfiniteTimestamp;

function of(
  date: PgDate,
  time: Interval = Interval.Zero,
  disposition: Disposition = "unspecified",
): FiniteTimestamp {
  return new FiniteTimestamp(date, time, disposition);
}

function fromParts(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
  milliseconds = 0,
  disposition: Disposition = "unspecified",
): FiniteTimestamp {
  const parts = [hours, minutes, seconds, milliseconds];
  if (!parts.every(Number.isSafeInteger)) {
    throw new TemporalError(
      "InvalidArgument",
      `Time components "${parts.join(", ")}" must be integers`,
    );
  }
  const time = BigInt(hours) * TICKS_PER_HOUR +
    BigInt(minutes) * TICKS_PER_MINUTE +
    BigInt(seconds) * TICKS_PER_SECOND +
    BigInt(milliseconds) * TICKS_PER_MILLISECOND;
  return new FiniteTimestamp(
    new PgDate(year, month, day),
    Interval.fromTicks(time),
    disposition,
  );
}

/**
 * `Date` has no notion of a time zone of its own, the disposition picks
 * whether its UTC or its local clock reading is taken
 */
function fromDate(
  date: Date,
  disposition: Disposition = "utc",
): FiniteTimestamp {
  if (Number.isNaN(date.getTime())) {
    throw new TemporalError("InvalidArgument", "Invalid Date");
  }
  const local = disposition === "local";
  const milliseconds = local
    ? ((date.getHours() * 60 + date.getMinutes()) * 60 + date.getSeconds()) *
        1000 + date.getMilliseconds()
    : ((date.getUTCHours() * 60 + date.getUTCMinutes()) * 60 +
      date.getUTCSeconds()) * 1000 + date.getUTCMilliseconds();
  return new FiniteTimestamp(
    PgDate.fromDate(date, !local),
    Interval.fromTicks(BigInt(milliseconds) * TICKS_PER_MILLISECOND),
    disposition,
  );
}

/**
 * Builds a value from ticks of 100 nanoseconds since 0001-01-01 00:00:00
 */
function fromTicks(
  ticks: bigint,
  disposition: Disposition = "unspecified",
): FiniteTimestamp {
  const days = floorDiv(ticks, TICKS_PER_DAY);
  return new FiniteTimestamp(
    PgDate.fromDaysSinceEra(Number(days)),
    Interval.fromTicks(ticks - days * TICKS_PER_DAY),
    disposition,
  );
}

function now(): FiniteTimestamp {
  return fromDate(new Date(), "local");
}

/**
 * Parses `infinity`, `-infinity` or `YYYY-MM-DD[ HH:MM[:SS[.fffffff]]]` with
 * an optional ` BC` marker, case-insensitively. A UTC offset on the time,
 * such as `+02` or `Z`, shifts the value to UTC and tags it `utc`. The
 * offset must be attached to the time, a separate token is rejected
 *
 * An out-of-range component fails with `Overflow`, anything else that can't
 * be read fails with `FormatError`
 */
function parse(value: string | null | undefined): Result<Timestamp> {
  if (value === null || value === undefined) {
    return err("NullArgument", "Can't parse a null timestamp");
  }

  const text = value.trim().toLowerCase();
  switch (text) {
    case "infinity":
      return ok(Timestamp.Infinity);
    case "-infinity":
      return ok(Timestamp.NegativeInfinity);
  }

  try {
    const tokens = text.split(/\s+/);
    const isBC = tokens.includes("bc");
    const [datePart, timePart, ...rest] = tokens.filter((token) =>
      token !== "bc" && token !== "ad"
    );
    if (rest.length > 0) {
      return err("FormatError", `Invalid timestamp: "${value}"`);
    }

    const date = PgDate.parse(isBC ? `${datePart} BC` : datePart);
    if (timePart === undefined) {
      return ok(new FiniteTimestamp(date, Interval.Zero));
    }

    const zone = TIMEZONE_RE.exec(timePart);
    const time = parseTimeOfDay(
      zone ? timePart.slice(0, zone.index) : timePart,
    );
    const timestamp = new FiniteTimestamp(date, time);
    if (!zone) {
      return ok(timestamp);
    }
    return ok(
      fromTicks(timestamp.ticks - decodeTimezoneOffset(zone[1]), "utc"),
    );
  } catch (e) {
    if (e instanceof TemporalError && e.kind === "Overflow") {
      return { ok: false, error: e };
    }
    return err("FormatError", `Invalid timestamp: "${value}"`, e);
  }
}

/**
 * Comparer for `Array.prototype.sort`, in the order of `compareTo`
 */
function compare(a: Timestamp, b: Timestamp): number {
  return compareTimestamps(a, b);
}

export const Timestamp = {
  /** 1970-01-01 00:00:00 */
  Epoch: of(PgDate.Epoch),
  /** 0001-01-01 00:00:00 */
  Era: of(PgDate.Era),
  Infinity: new InfiniteTimestamp("infinity"),
  NegativeInfinity: new InfiniteTimestamp("-infinity"),
  of,
  fromParts,
  fromDate,
  fromTicks,
  now,
  parse,
  compare,
} as const;
