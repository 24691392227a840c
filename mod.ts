export {
  type ErrorKind,
  err,
  ok,
  ProtocolError,
  type Result,
  TemporalError,
  unwrap,
} from "./error.ts";
export type { DebugControls } from "./debug.ts";
export { Circle, type Point } from "./types/circle.ts";
export { PgDate } from "./types/date.ts";
export {
  Interval,
  parseTimeOfDay,
  TICKS_PER_DAY,
  TICKS_PER_HOUR,
  TICKS_PER_MILLISECOND,
  TICKS_PER_MINUTE,
  TICKS_PER_SECOND,
} from "./types/interval.ts";
export {
  type Disposition,
  FiniteTimestamp,
  InfiniteTimestamp,
  Timestamp,
  type TimestampKind,
} from "./types/timestamp.ts";
export { type FixedWidthCodec, readFixed, writeFixed } from "./codec/codec.ts";
export { circleCodec } from "./codec/circle.ts";
export { intervalCodec } from "./codec/interval.ts";
export { timestampCodec, timestamptzCodec } from "./codec/timestamp.ts";
export {
  type BinaryValue,
  getBinaryCodec,
  hasBinaryCodec,
} from "./codec/registry.ts";
export { PacketReader, PacketWriter } from "./codec/packet.ts";
export { Oid, type OidType, OidTypes, type OidValue } from "./query/oid.ts";
export type {
  ClientControls,
  DecoderFunction,
  Decoders,
  DecodeStrategy,
} from "./query/controls.ts";
export { Column, decode, Format } from "./query/decode.ts";
export { encodeArgument, encodeBinary, type EncodedArg } from "./query/encode.ts";
