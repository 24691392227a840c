import chalk from "chalk";
import { writeFixed } from "../codec/codec.ts";
import { PacketWriter } from "../codec/packet.ts";
import { getBinaryCodec } from "../codec/registry.ts";
import { isDebugOptionEnabled } from "../debug.ts";
import { Circle } from "../types/circle.ts";
import { PgDate } from "../types/date.ts";
import { Interval } from "../types/interval.ts";
import { FiniteTimestamp, InfiniteTimestamp } from "../types/timestamp.ts";
import type { ClientControls } from "./controls.ts";

function pad(number: number, digits: number): string {
  return String(number).padStart(digits, "0");
}

function encodeDate(date: Date): string {
  // Construct ISO date
  const year = pad(date.getFullYear(), 4);
  const month = pad(date.getMonth() + 1, 2);
  const day = pad(date.getDate(), 2);
  const hour = pad(date.getHours(), 2);
  const min = pad(date.getMinutes(), 2);
  const sec = pad(date.getSeconds(), 2);
  const ms = pad(date.getMilliseconds(), 3);

  const encodedDate = `${year}-${month}-${day}T${hour}:${min}:${sec}.${ms}`;

  // Construct timezone info
  //
  // Date.prototype.getTimezoneOffset();
  //
  // From MDN:
  // > The time-zone offset is the difference, in minutes, from local time to UTC.
  // > Note that this means that the offset is positive if the local timezone is
  // > behind UTC and negative if it is ahead. For example, for time zone UTC+10:00
  // > (Australian Eastern Standard Time, Vladivostok Time, Chamorro Standard Time),
  // > -600 will be returned.
  const offset = date.getTimezoneOffset();
  const tzSign = offset > 0 ? "-" : "+";
  const absOffset = Math.abs(offset);
  const tzHours = pad(Math.floor(absOffset / 60), 2);
  const tzMinutes = pad(Math.floor(absOffset % 60), 2);

  const encodedTz = `${tzSign}${tzHours}:${tzMinutes}`;

  return encodedDate + encodedTz;
}

function escapeArrayElement(value: string): string {
  const escapedValue = value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
  return `"${escapedValue}"`;
}

function encodeArray(array: Array<unknown>): string {
  let encodedArray = "{";

  array.forEach((element, index) => {
    if (index > 0) {
      encodedArray += ",";
    }

    const encoded = Array.isArray(element)
      ? encodeArray(element)
      : encodeText(element);
    if (encoded === null) {
      encodedArray += "NULL";
    } else if (Array.isArray(element)) {
      encodedArray += encoded;
    } else {
      encodedArray += escapeArrayElement(encoded);
    }
  });

  encodedArray += "}";
  return encodedArray;
}

function encodeBytes(value: Uint8Array): string {
  const hex = Array.from(value)
    .map((val) => (val < 0x10 ? `0${val.toString(16)}` : val.toString(16)))
    .join("");
  return `\\x${hex}`;
}

export type EncodedArg = null | string;

/**
 * Encodes a value to its text representation, as sent for a query argument
 */
export function encodeArgument(
  value: unknown,
  controls?: ClientControls,
): EncodedArg {
  const encoded = encodeText(value);
  if (isDebugOptionEnabled("encoding", controls?.debug)) {
    console.error(`${chalk.bold.yellow("ENCODED")} ${String(encoded)}`);
  }
  return encoded;
}

function encodeText(value: unknown): EncodedArg {
  if (value === null || typeof value === "undefined") {
    return null;
  } else if (value instanceof Uint8Array) {
    return encodeBytes(value);
  } else if (value instanceof Date) {
    return encodeDate(value);
  } else if (
    value instanceof FiniteTimestamp ||
    value instanceof InfiniteTimestamp ||
    value instanceof Interval ||
    value instanceof PgDate ||
    value instanceof Circle
  ) {
    return value.toString();
  } else if (value instanceof Array) {
    return encodeArray(value);
  } else if (value instanceof Object) {
    return JSON.stringify(value);
  } else {
    return String(value);
  }
}

/**
 * Encodes a value, or its text representation, in the binary format of the
 * type with the given oid
 */
export function encodeBinary(
  value: unknown,
  oid: number,
  controls?: ClientControls,
): Uint8Array {
  const codec = getBinaryCodec(oid);
  if (typeof value !== "string" && !codec.is(value)) {
    throw new TypeError(
      `Value "${String(value)}" can't be encoded as type "${codec.name}"`,
    );
  }

  const writer = new PacketWriter(codec.width);
  writeFixed(codec, value, writer);
  const encoded = writer.flush();

  if (isDebugOptionEnabled("encoding", controls?.debug)) {
    console.error(
      `${chalk.bold.yellow("ENCODED")} ${codec.name}: ${encoded.byteLength} bytes`,
    );
  }
  return encoded;
}
