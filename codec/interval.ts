import { Oid } from "../query/oid.ts";
import { Interval } from "../types/interval.ts";
import type { FixedWidthCodec } from "./codec.ts";

const TICKS_PER_MICROSECOND = 10n;

/**
 * `interval` is an int64 of microseconds for the time part, then an int32 of
 * days and an int32 of months
 */
export const intervalCodec: FixedWidthCodec<Interval> = {
  name: "interval",
  oid: Oid.interval,
  width: 16,
  is(value): value is Interval {
    return value instanceof Interval;
  },
  read(reader) {
    const microseconds = reader.readInt64();
    const days = reader.readInt32();
    const months = reader.readInt32();
    return new Interval(months, days, microseconds * TICKS_PER_MICROSECOND);
  },
  readText(reader, length) {
    return this.read(reader, length).toString();
  },
  validateAndGetLength() {
    return 16;
  },
  write(value, writer) {
    const interval = typeof value === "string" ? Interval.parse(value) : value;
    writer.addInt64(interval.ticks / TICKS_PER_MICROSECOND);
    writer.addInt32(interval.days);
    writer.addInt32(interval.months);
  },
};
