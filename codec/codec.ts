import { ProtocolError } from "../error.ts";
import type { PacketReader, PacketWriter } from "./packet.ts";

/**
 * Binary codec of a type whose wire length never changes. Reading and
 * writing is plain field by field transcription, in a fixed order
 */
export interface FixedWidthCodec<T> {
  /** Name of the type in `pg_type` */
  readonly name: string;
  readonly oid: number;
  /** Length in bytes of every value on the wire */
  readonly width: number;
  /** Tests whether a value is of the type this codec writes */
  is(value: unknown): value is T;
  /**
   * `length` is the length the server declared for the field, already
   * checked against `width` by {@linkcode readFixed}
   */
  read(reader: PacketReader, length: number): T;
  /** Reads the value and returns its text representation */
  readText(reader: PacketReader, length: number): string;
  /** Always `width`, whatever the value */
  validateAndGetLength(value: T | string): number;
  /** Accepts the value or its text representation */
  write(value: T | string, writer: PacketWriter): void;
}

/**
 * Reads a value after checking the length declared by the server against the
 * width of the codec
 */
export function readFixed<T>(
  codec: FixedWidthCodec<T>,
  reader: PacketReader,
  length: number,
): T {
  if (length !== codec.width) {
    throw new ProtocolError(
      `Invalid length for type "${codec.name}": expected ${codec.width} bytes, ${length} given`,
    );
  }
  return codec.read(reader, length);
}

/**
 * Writes a value and checks that the codec wrote exactly the length it
 * reported
 */
export function writeFixed<T>(
  codec: FixedWidthCodec<T>,
  value: T | string,
  writer: PacketWriter,
): number {
  const length = codec.validateAndGetLength(value);
  const start = writer.byteLength;
  codec.write(value, writer);
  const written = writer.byteLength - start;
  if (written !== length) {
    throw new ProtocolError(
      `Codec for type "${codec.name}" wrote ${written} bytes, ${length} expected`,
    );
  }
  return length;
}
