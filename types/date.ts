import { TemporalError } from "../error.ts";

// 0001-01-01 is day zero, 1970-01-01 is this many days after it
const DAYS_TO_UNIX_EPOCH = 719162;
const DATE_RE = /^(\d+)-(\d{1,2})-(\d{1,2})(?:\s*(bc|ad))?$/i;
// https://www.postgresql.org/docs/current/datatype-datetime.html
const MIN_YEAR = -4713;
const MAX_YEAR = 5874897;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Years carry no year zero, 1 BC is year `-1`. The calendar math below works
 * on astronomical years, where 1 BC is year 0
 */
function toAstronomical(year: number): number {
  return year > 0 ? year : year + 1;
}

function fromAstronomical(year: number): number {
  return year > 0 ? year : year - 1;
}

function isLeapAstronomical(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(astronomicalYear: number, month: number): number {
  if (month === 2 && isLeapAstronomical(astronomicalYear)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1];
}

// Based on Howard Hinnant's `days_from_civil`
// http://howardhinnant.github.io/date_algorithms.html
function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const doy = Math.floor((153 * (month > 2 ? month - 3 : month + 9) + 2) / 5) +
    day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146097 + doe - 719468;
}

function civilFromDays(days: number): [number, number, number] {
  const z = days + 719468;
  const era = Math.floor(z / 146097);
  const doe = z - era * 146097;
  const yoe = Math.floor(
    (doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) -
      Math.floor(doe / 146096)) / 365,
  );
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  return [yoe + era * 400 + (month <= 2 ? 1 : 0), month, day];
}

/**
 * A calendar date with the range of the Postgres `date` type, from 4713 BC
 * to 5874897 AD. There is no year zero: 1 BC is year `-1`
 *
 * https://www.postgresql.org/docs/current/datatype-datetime.html
 */
export class PgDate {
  static readonly Epoch = new PgDate(1970, 1, 1);
  static readonly Era = new PgDate(1, 1, 1);

  /**
   * Days since 0001-01-01, negative for dates before it
   */
  readonly daysSinceEra: number;

  /**
   * Throws a TemporalError of kind `Overflow` when any component is out of
   * range
   */
  constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {
    if (
      !Number.isInteger(year) || year === 0 || year < MIN_YEAR ||
      year > MAX_YEAR
    ) {
      throw new TemporalError("Overflow", `Year "${year}" is out of range`);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new TemporalError("Overflow", `Month "${month}" is out of range`);
    }
    const astronomical = toAstronomical(year);
    if (
      !Number.isInteger(day) || day < 1 ||
      day > daysInMonth(astronomical, month)
    ) {
      throw new TemporalError(
        "Overflow",
        `Day "${day}" is out of range for ${year}-${month}`,
      );
    }
    this.daysSinceEra = daysFromCivil(astronomical, month, day) +
      DAYS_TO_UNIX_EPOCH;
  }

  static fromDaysSinceEra(days: number): PgDate {
    if (!Number.isSafeInteger(days)) {
      throw new TemporalError(
        "InvalidArgument",
        `Day count "${days}" must be an integer`,
      );
    }
    const [year, month, day] = civilFromDays(days - DAYS_TO_UNIX_EPOCH);
    return new PgDate(fromAstronomical(year), month, day);
  }

  /**
   * Takes the calendar date of a native Date, read either in UTC or in the
   * host time zone
   */
  static fromDate(date: Date, useUtc: boolean): PgDate {
    if (useUtc) {
      return new PgDate(
        fromAstronomical(date.getUTCFullYear()),
        date.getUTCMonth() + 1,
        date.getUTCDate(),
      );
    }
    return new PgDate(
      fromAstronomical(date.getFullYear()),
      date.getMonth() + 1,
      date.getDate(),
    );
  }

  /**
   * Parses `YYYY-MM-DD` with an optional trailing `BC` or `AD` marker
   *
   * Throws a TemporalError of kind `FormatError` when the text is not a date
   * and of kind `Overflow` when a component is out of range
   */
  static parse(value: string): PgDate {
    const matches = DATE_RE.exec(value.trim());
    if (!matches) {
      throw new TemporalError("FormatError", `Invalid date: "${value}"`);
    }

    const isBC = matches[4]?.toLowerCase() === "bc";
    const year = parseInt(matches[1], 10);
    if (year === 0) {
      throw new TemporalError(
        "Overflow",
        `Invalid date: "${value}". There is no year zero`,
      );
    }

    return new PgDate(
      isBC ? -year : year,
      parseInt(matches[2], 10),
      parseInt(matches[3], 10),
    );
  }

  get isBC(): boolean {
    return this.year < 0;
  }

  get isLeapYear(): boolean {
    return isLeapAstronomical(toAstronomical(this.year));
  }

  /**
   * 1 for the first of January
   */
  get dayOfYear(): number {
    return this.daysSinceEra - new PgDate(this.year, 1, 1).daysSinceEra + 1;
  }

  /**
   * 0 for Sunday through 6 for Saturday
   */
  get dayOfWeek(): number {
    // 0001-01-01 was a Monday
    return (((this.daysSinceEra + 1) % 7) + 7) % 7;
  }

  addDays(days: number): PgDate {
    return PgDate.fromDaysSinceEra(this.daysSinceEra + days);
  }

  /**
   * The day is clamped to the length of the target month, so adding a month
   * to January 31st lands on the last day of February
   */
  addMonths(months: number): PgDate {
    const total = toAstronomical(this.year) * 12 + (this.month - 1) + months;
    const year = Math.floor(total / 12);
    const month = total - year * 12 + 1;
    return new PgDate(
      fromAstronomical(year),
      month,
      Math.min(this.day, daysInMonth(year, month)),
    );
  }

  addYears(years: number): PgDate {
    const year = toAstronomical(this.year) + years;
    return new PgDate(
      fromAstronomical(year),
      this.month,
      Math.min(this.day, daysInMonth(year, this.month)),
    );
  }

  compareTo(other: PgDate): number {
    return Math.sign(this.daysSinceEra - other.daysSinceEra);
  }

  equals(other: PgDate): boolean {
    return this.daysSinceEra === other.daysSinceEra;
  }

  toString(): string {
    const date = `${String(Math.abs(this.year)).padStart(4, "0")}-${
      String(this.month).padStart(2, "0")
    }-${String(this.day).padStart(2, "0")}`;
    return this.isBC ? `${date} BC` : date;
  }
}
