import { ProtocolError } from "../error.ts";
import { Column, decode, Format } from "../query/decode.ts";
import { Oid } from "../query/oid.ts";
import { Circle } from "../types/circle.ts";
import { PgDate } from "../types/date.ts";
import { Interval } from "../types/interval.ts";
import { FiniteTimestamp, Timestamp } from "../types/timestamp.ts";
import {
  assert,
  assertEquals,
  assertStrictEquals,
  assertThrows,
  test,
  vi,
} from "./test_deps.ts";

const encoder = new TextEncoder();

function textColumn(name: string, typeOid: number) {
  return new Column(name, 0, 0, typeOid, -1, -1, Format.TEXT);
}

function binaryColumn(name: string, typeOid: number, length: number) {
  return new Column(name, 0, 0, typeOid, length, -1, Format.BINARY);
}

function decodeText(value: string, column: Column) {
  return decode(encoder.encode(value), column);
}

const CIRCLE_BYTES = new Uint8Array([
  0x3f, 0xf8, 0, 0, 0, 0, 0, 0,
  0xc0, 0x02, 0, 0, 0, 0, 0, 0,
  0x40, 0x08, 0, 0, 0, 0, 0, 0,
]);

test("decode text values by type", function () {
  assertEquals(
    decodeText("<(1,2),3>", textColumn("area", Oid.circle)),
    new Circle(1, 2, 3),
  );
  assertEquals(
    decodeText("2024-01-15", textColumn("day", Oid.date)),
    new PgDate(2024, 1, 15),
  );
  assertEquals(
    decodeText("1 day", textColumn("span", Oid.interval)),
    new Interval(0, 1, 0n),
  );
  assertEquals(decodeText("1.5", textColumn("radius", Oid.float8)), 1.5);
  assertEquals(decodeText("hello", textColumn("name", Oid.text)), "hello");
  // bool
  assertEquals(decodeText("t", textColumn("flag", 16)), "t");
});

test("decode text timestamps", function () {
  assertStrictEquals(
    decodeText("infinity", textColumn("until", Oid.timestamp)),
    Timestamp.Infinity,
  );
  assertStrictEquals(
    decodeText("-infinity", textColumn("since", Oid.timestamptz)),
    Timestamp.NegativeInfinity,
  );

  const timestamp = decodeText(
    "1997-12-17 07:37:16-08",
    textColumn("created_at", Oid.timestamptz),
  );
  assert(timestamp instanceof FiniteTimestamp);
  assertEquals(timestamp.disposition, "utc");
  assertEquals(timestamp.toString(), "1997-12-17 15:37:16");
});

test("decode binary values with their codec", function () {
  assertEquals(
    decode(CIRCLE_BYTES, binaryColumn("area", Oid.circle, 24)),
    new Circle(1.5, -2.25, 3),
  );
  assertStrictEquals(
    decode(
      new Uint8Array([0x80, 0, 0, 0, 0, 0, 0, 0]),
      binaryColumn("since", Oid.timestamp, 8),
    ),
    Timestamp.NegativeInfinity,
  );

  assertThrows(
    () => decode(CIRCLE_BYTES.slice(0, 16), binaryColumn("area", Oid.circle, 16)),
    ProtocolError,
    'Invalid length for type "circle": expected 24 bytes, 16 given',
  );
  assertThrows(
    () => decode(encoder.encode("hello"), binaryColumn("name", Oid.text, 5)),
    ProtocolError,
    "Decoding binary data is not implemented for type Oid 25 (text)",
  );
});

test("decode with the string strategy", function () {
  const controls = { decodeStrategy: "string" } as const;
  assertEquals(
    decode(encoder.encode("<(1,2),3>"), textColumn("area", Oid.circle), controls),
    "<(1,2),3>",
  );
  assertEquals(
    decode(encoder.encode("infinity"), textColumn("until", Oid.timestamp), controls),
    "infinity",
  );
  // binary values are still read by their codec
  assertEquals(
    decode(CIRCLE_BYTES, binaryColumn("area", Oid.circle, 24), controls),
    new Circle(1.5, -2.25, 3),
  );
});

test("decode with custom decoders", function () {
  const seen: number[] = [];
  const controls = {
    decodeStrategy: "string",
    decoders: {
      [Oid.circle]: (value: string, oid: number) => {
        seen.push(oid);
        return Circle.parse(value).radius;
      },
      circle: () => "by name",
      timestamp: (value: string) => value.toUpperCase(),
    },
  } as const;

  // the oid takes precedence over the type name
  assertEquals(
    decode(encoder.encode("<(1,2),3>"), textColumn("area", Oid.circle), controls),
    3,
  );
  assertEquals(seen, [Oid.circle]);
  assertEquals(
    decode(encoder.encode("infinity"), textColumn("until", Oid.timestamp), controls),
    "INFINITY",
  );
  // no decoder for this type, the strategy applies
  assertEquals(
    decode(encoder.encode("1 day"), textColumn("span", Oid.interval), controls),
    "1 day",
  );
});

test("decode defaults invalid text values to null", function () {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  try {
    assertEquals(decodeText("<(a,b),c>", textColumn("area", Oid.circle)), null);
    assertEquals(decodeText("2024-13-01", textColumn("day", Oid.date)), null);
    assertEquals(error.mock.calls.length, 2);

    const message = String(error.mock.calls[0][0]);
    assert(message.includes("Error decoding type Oid 718 value"));
    assert(message.includes("Defaulting to null."));
  } finally {
    error.mockRestore();
  }
});

test("decode logs decoded values when debugging", function () {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  try {
    const column = textColumn("radius", Oid.float8);
    decode(encoder.encode("1.5"), column, { debug: { decoding: true } });
    decode(encoder.encode("2.5"), column, { debug: true });
    decode(encoder.encode("3.5"), column, { debug: { encoding: true } });
    decode(encoder.encode("4.5"), column);

    assertEquals(error.mock.calls.length, 2);
    assert(
      String(error.mock.calls[0][0]).endsWith(
        " radius (Oid 701, TEXT): 1.5",
      ),
    );
    assert(
      String(error.mock.calls[1][0]).endsWith(
        " radius (Oid 701, TEXT): 2.5",
      ),
    );
  } finally {
    error.mockRestore();
  }
});
