import chalk from "chalk";
import { readFixed } from "../codec/codec.ts";
import { PacketReader } from "../codec/packet.ts";
import { getBinaryCodec } from "../codec/registry.ts";
import { isDebugOptionEnabled } from "../debug.ts";
import type { ClientControls } from "./controls.ts";
import {
  decodeCircle,
  decodeDate,
  decodeFloat,
  decodeInterval,
  decodeTimestamp,
} from "./decoders.ts";
import { isOidValue, Oid, OidTypes } from "./oid.ts";

export class Column {
  constructor(
    public name: string,
    public tableOid: number,
    public index: number,
    public typeOid: number,
    public columnLength: number,
    public typeModifier: number,
    public format: Format,
  ) {}
}

export enum Format {
  TEXT = 0,
  BINARY = 1,
}

const decoder = new TextDecoder();

function decodeBinary(value: Uint8Array, typeOid: number) {
  const codec = getBinaryCodec(typeOid);
  return readFixed(codec, new PacketReader(value), value.length);
}

function decodeText(value: string, typeOid: number) {
  try {
    switch (typeOid) {
      case Oid.text:
        return value;
      case Oid.float8:
        return decodeFloat(value);
      case Oid.circle:
        return decodeCircle(value);
      case Oid.date:
        return decodeDate(value);
      case Oid.interval:
        return decodeInterval(value);
      case Oid.timestamp:
      case Oid.timestamptz:
        return decodeTimestamp(value);
      default:
        // A separate category for not handled values
        // They might or might not be represented correctly as strings,
        // returning them to the user as raw strings allows them to parse
        // them as they see fit
        return value;
    }
  } catch (e) {
    console.error(
      chalk.bold.yellow(`Error decoding type Oid ${typeOid} value`) +
        (e instanceof Error ? e.message : String(e)) +
        "\n" +
        chalk.bold("Defaulting to null."),
    );
    // If an error occurred during decoding, return null
    return null;
  }
}

function decodeField(
  value: Uint8Array,
  column: Column,
  controls?: ClientControls,
): unknown {
  // binary values can only be read by their codec
  if (column.format === Format.BINARY) {
    return decodeBinary(value, column.typeOid);
  } else if (column.format !== Format.TEXT) {
    throw new Error(`Unknown column format: ${column.format}`);
  }

  const strValue = decoder.decode(value);

  // check if there is a custom decoder by oid (number) or by type name (string)
  const decoderFunc = controls?.decoders?.[column.typeOid] ??
    (isOidValue(column.typeOid)
      ? controls?.decoders?.[OidTypes[column.typeOid]]
      : undefined);
  if (decoderFunc) {
    return decoderFunc(strValue, column.typeOid);
  }

  // check if the decode strategy is `string`
  if (controls?.decodeStrategy === "string") {
    return strValue;
  }

  // else, default to 'auto' mode, which uses the typeOid to determine the decoding strategy
  return decodeText(strValue, column.typeOid);
}

export function decode(
  value: Uint8Array,
  column: Column,
  controls?: ClientControls,
): unknown {
  const decoded = decodeField(value, column, controls);

  if (isDebugOptionEnabled("decoding", controls?.debug)) {
    console.error(
      `${chalk.bold.yellow("DECODED")} ${column.name} (Oid ${column.typeOid}, ${
        Format[column.format]
      }): ${String(decoded)}`,
    );
  }

  return decoded;
}
