import { circleCodec } from "../codec/circle.ts";
import { readFixed, writeFixed } from "../codec/codec.ts";
import { intervalCodec } from "../codec/interval.ts";
import { PacketReader, PacketWriter } from "../codec/packet.ts";
import { getBinaryCodec, hasBinaryCodec } from "../codec/registry.ts";
import { timestampCodec, timestamptzCodec } from "../codec/timestamp.ts";
import { ProtocolError, unwrap } from "../error.ts";
import { Oid } from "../query/oid.ts";
import { Circle } from "../types/circle.ts";
import { Interval } from "../types/interval.ts";
import { Timestamp } from "../types/timestamp.ts";
import { withTimezoneOffset } from "./helpers.ts";
import {
  assert,
  assertEquals,
  assertStrictEquals,
  assertThrows,
  test,
} from "./test_deps.ts";

const CIRCLE_BYTES = new Uint8Array([
  // 1.5
  0x3f, 0xf8, 0, 0, 0, 0, 0, 0,
  // -2.25
  0xc0, 0x02, 0, 0, 0, 0, 0, 0,
  // 3
  0x40, 0x08, 0, 0, 0, 0, 0, 0,
]);

test("circleCodec writes x, y and radius as big-endian doubles", function () {
  const writer = new PacketWriter();
  const length = writeFixed(circleCodec, new Circle(1.5, -2.25, 3), writer);
  assertEquals(length, 24);
  assertEquals(writer.flush(), CIRCLE_BYTES);
});

test("circleCodec writes the text representation", function () {
  const writer = new PacketWriter();
  writeFixed(circleCodec, "<(1.5,-2.25),3>", writer);
  assertEquals(writer.flush(), CIRCLE_BYTES);
});

test("circleCodec round trip", function () {
  const writer = new PacketWriter();
  writeFixed(circleCodec, new Circle(1.5, -2.25, 3.0), writer);
  const bytes = writer.flush();

  const circle = readFixed(circleCodec, new PacketReader(bytes), bytes.length);
  assert(Object.is(circle.x, 1.5));
  assert(Object.is(circle.y, -2.25));
  assert(Object.is(circle.radius, 3));
  assertEquals(
    circleCodec.readText(new PacketReader(bytes), bytes.length),
    "<(1.5,-2.25),3>",
  );
});

test("circleCodec writes its own text form of NaN and infinite circles", function () {
  const writer = new PacketWriter();
  writeFixed(circleCodec, new Circle(NaN, 0, Infinity), writer);
  const bytes = writer.flush();

  const text = circleCodec.readText(new PacketReader(bytes), bytes.length);
  assertEquals(text, "<(NaN,0),Infinity>");
  assertEquals(writeFixed(circleCodec, text, writer), 24);
  assertEquals(writer.flush(), bytes);

  const circle = readFixed(circleCodec, new PacketReader(bytes), bytes.length);
  assert(Number.isNaN(circle.x));
  assertEquals(circle.radius, Infinity);
});

test("circleCodec length is always 24", function () {
  assertEquals(circleCodec.validateAndGetLength(new Circle(0, 0, 0)), 24);
  assertEquals(
    circleCodec.validateAndGetLength(new Circle(1e300, -1e300, 5e-324)),
    24,
  );
  assertEquals(circleCodec.validateAndGetLength("<(1,2),3>"), 24);
});

test("readFixed rejects a declared length other than the width", function () {
  assertThrows(
    () => readFixed(circleCodec, new PacketReader(CIRCLE_BYTES), 16),
    ProtocolError,
    'Invalid length for type "circle": expected 24 bytes, 16 given',
  );
});

test("PacketReader doesn't read past the end of the buffer", function () {
  const reader = new PacketReader(new Uint8Array(12));
  assertEquals(reader.readDouble(), 0);
  assertEquals(reader.remaining, 4);
  assertThrows(
    () => reader.readDouble(),
    ProtocolError,
    "Can't read 8 bytes, only 4 left in the buffer",
  );
});

test("PacketWriter grows past its initial size", function () {
  const writer = new PacketWriter(4);
  writer.addDouble(1.5).addInt32(-1).addInt64(-2n);
  assertEquals(writer.byteLength, 20);

  const reader = new PacketReader(writer.flush());
  assertEquals(reader.readDouble(), 1.5);
  assertEquals(reader.readInt32(), -1);
  assertEquals(reader.readInt64(), -2n);
  assertEquals(writer.byteLength, 0);
});

function encodeWith(
  codec: typeof timestampCodec,
  value: Timestamp | string,
): Uint8Array {
  const writer = new PacketWriter();
  writeFixed(codec, value, writer);
  return writer.flush();
}

function decodeWith(codec: typeof timestampCodec, bytes: number[]) {
  return readFixed(codec, new PacketReader(new Uint8Array(bytes)), 8);
}

test("timestampCodec counts microseconds from 2000-01-01", function () {
  assertEquals(
    encodeWith(timestampCodec, "2000-01-01 00:00:00"),
    new Uint8Array(8),
  );
  assertEquals(
    decodeWith(timestampCodec, [0, 0, 0, 0, 0, 0, 0, 1]).toString(),
    "2000-01-01 00:00:00.000001",
  );
  assertEquals(
    decodeWith(timestampCodec, [
      0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff,
    ]).toString(),
    "1999-12-31 23:59:59.999999",
  );
});

test("timestampCodec truncates sub-microsecond ticks towards zero", function () {
  const y2k = unwrap(Timestamp.parse("2000-01-01 00:00:00"));
  // 1.5 microseconds on either side of 2000-01-01
  assertEquals(
    encodeWith(timestampCodec, y2k.addTicks(15n)),
    new Uint8Array([0, 0, 0, 0, 0, 0, 0, 1]),
  );
  assertEquals(
    encodeWith(timestampCodec, y2k.addTicks(-15n)),
    new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]),
  );
});

test("timestampCodec infinity", function () {
  const infinity = [0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff];
  const negativeInfinity = [0x80, 0, 0, 0, 0, 0, 0, 0];

  assertEquals(
    encodeWith(timestampCodec, Timestamp.Infinity),
    new Uint8Array(infinity),
  );
  assertEquals(
    encodeWith(timestampCodec, Timestamp.NegativeInfinity),
    new Uint8Array(negativeInfinity),
  );
  assertStrictEquals(decodeWith(timestampCodec, infinity), Timestamp.Infinity);
  assertStrictEquals(
    decodeWith(timestampCodec, negativeInfinity),
    Timestamp.NegativeInfinity,
  );
});

test("timestampCodec round trip", function () {
  const timestamp = unwrap(Timestamp.parse("0044-03-15 12:00:00.25 BC"));
  const decoded = readFixed(
    timestampCodec,
    new PacketReader(encodeWith(timestampCodec, timestamp)),
    8,
  );
  assert(decoded.equals(timestamp));
  assertEquals(decoded.disposition, "unspecified");
});

test("timestamptzCodec writes UTC values", function () {
  // UTC+02:00
  withTimezoneOffset(-120, () => {
    const unspecified = Timestamp.fromParts(2000, 1, 1, 2, 0, 0);
    assertEquals(encodeWith(timestamptzCodec, unspecified), new Uint8Array(8));

    const utc = Timestamp.fromParts(2000, 1, 1, 0, 0, 0, 0, "utc");
    assertEquals(encodeWith(timestamptzCodec, utc), new Uint8Array(8));
  });

  const decoded = decodeWith(timestamptzCodec, [0, 0, 0, 0, 0, 0, 0, 0]);
  assertEquals(decoded.disposition, "utc");
  assertEquals(decoded.toString(), "2000-01-01 00:00:00");
});

test("intervalCodec reads microseconds, days and months", function () {
  const bytes = new Uint8Array([
    // 1 second
    0, 0, 0, 0, 0, 0x0f, 0x42, 0x40,
    // 2 days
    0, 0, 0, 2,
    // 1 month
    0, 0, 0, 1,
  ]);
  const interval = readFixed(intervalCodec, new PacketReader(bytes), 16);
  assertEquals(interval, new Interval(1, 2, 10_000_000n));
  assertEquals(interval.toString(), "1 mon 2 days 00:00:01");

  const writer = new PacketWriter();
  assertEquals(writeFixed(intervalCodec, "1 mon 2 days 00:00:01", writer), 16);
  assertEquals(writer.flush(), bytes);
});

test("binary codecs are registered by oid", function () {
  assertStrictEquals(getBinaryCodec(Oid.circle), circleCodec);
  assertStrictEquals(getBinaryCodec(Oid.timestamptz), timestamptzCodec);
  assert(hasBinaryCodec(Oid.interval));
  assert(!hasBinaryCodec(Oid.text));
  assertThrows(
    () => getBinaryCodec(Oid.text),
    ProtocolError,
    "Decoding binary data is not implemented for type Oid 25 (text)",
  );
});
