import { ProtocolError } from "../error.ts";
import { OidTypes, isOidValue } from "../query/oid.ts";
import type { Circle } from "../types/circle.ts";
import type { Interval } from "../types/interval.ts";
import type { Timestamp } from "../types/timestamp.ts";
import { circleCodec } from "./circle.ts";
import type { FixedWidthCodec } from "./codec.ts";
import { intervalCodec } from "./interval.ts";
import { timestampCodec, timestamptzCodec } from "./timestamp.ts";

export type BinaryValue = Circle | Interval | Timestamp;

const codecs = new Map<number, FixedWidthCodec<BinaryValue>>();

for (
  const codec of [
    circleCodec,
    intervalCodec,
    timestampCodec,
    timestamptzCodec,
  ] satisfies FixedWidthCodec<BinaryValue>[]
) {
  codecs.set(codec.oid, codec);
}

export function hasBinaryCodec(oid: number): boolean {
  return codecs.has(oid);
}

/**
 * Throws a ProtocolError when no binary codec handles the oid
 */
export function getBinaryCodec(oid: number): FixedWidthCodec<BinaryValue> {
  const codec = codecs.get(oid);
  if (!codec) {
    const name = isOidValue(oid) ? ` (${OidTypes[oid]})` : "";
    throw new ProtocolError(
      `Decoding binary data is not implemented for type Oid ${oid}${name}`,
    );
  }
  return codec;
}
