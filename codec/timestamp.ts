import { unwrap } from "../error.ts";
import { Oid } from "../query/oid.ts";
import { TICKS_PER_DAY } from "../types/interval.ts";
import {
  type Disposition,
  FiniteTimestamp,
  InfiniteTimestamp,
  Timestamp,
} from "../types/timestamp.ts";
import type { FixedWidthCodec } from "./codec.ts";

const MAX_INT64 = 0x7fffffffffffffffn;
const MIN_INT64 = -0x8000000000000000n;
// Postgres counts from 2000-01-01, 730119 days after 0001-01-01
const POSTGRES_EPOCH_TICKS = 730119n * TICKS_PER_DAY;
const TICKS_PER_MICROSECOND = 10n;

function createTimestampCodec(
  name: string,
  oid: number,
  disposition: Disposition,
): FixedWidthCodec<Timestamp> {
  return {
    name,
    oid,
    width: 8,
    is(value): value is Timestamp {
      return value instanceof FiniteTimestamp ||
        value instanceof InfiniteTimestamp;
    },
    read(reader) {
      const microseconds = reader.readInt64();
      if (microseconds === MAX_INT64) return Timestamp.Infinity;
      if (microseconds === MIN_INT64) return Timestamp.NegativeInfinity;
      return Timestamp.fromTicks(
        POSTGRES_EPOCH_TICKS + microseconds * TICKS_PER_MICROSECOND,
        disposition,
      );
    },
    readText(reader, length) {
      return this.read(reader, length).toString();
    },
    validateAndGetLength() {
      return 8;
    },
    write(value, writer) {
      let timestamp = typeof value === "string"
        ? unwrap(Timestamp.parse(value))
        : value;
      if (disposition === "utc") {
        timestamp = timestamp.toUniversalTime();
      }

      if (timestamp.isInfinity()) {
        writer.addInt64(MAX_INT64);
      } else if (timestamp.isNegativeInfinity()) {
        writer.addInt64(MIN_INT64);
      } else if (timestamp.isFinite()) {
        // the server keeps microseconds, the sub-microsecond ticks are dropped
        writer.addInt64(
          (timestamp.ticks - POSTGRES_EPOCH_TICKS) / TICKS_PER_MICROSECOND,
        );
      }
    },
  };
}

/**
 * `timestamp` is an int64 of microseconds since 2000-01-01 00:00:00, with the
 * extremes of int64 standing for `infinity` and `-infinity`
 */
export const timestampCodec = createTimestampCodec(
  "timestamp",
  Oid.timestamp,
  "unspecified",
);

/**
 * Same layout as `timestamp`, counted in UTC. Values are converted to UTC
 * before they are written
 */
export const timestamptzCodec = createTimestampCodec(
  "timestamptz",
  Oid.timestamptz,
  "utc",
);
