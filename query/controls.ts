import type { DebugControls } from "../debug.ts";
import type { OidType } from "./oid.ts";

/**
 * The strategy to use when decoding text results data
 */
export type DecodeStrategy = "string" | "auto";

/**
 * A decoder function that takes a string value and returns a parsed value of some type.
 *
 * @param value The string value to parse
 * @param oid The OID of the column type the value is from
 */
export type DecoderFunction = (value: string, oid: number) => unknown;

/**
 * A dictionary of functions used to decode (parse) column field values from string to a custom type. These functions will
 * take precedence over the {@linkcode DecodeStrategy}. Each key in the dictionary is the column OID type number or Oid type name,
 * and the value is the decoder function.
 */
export type Decoders = {
  [key in number | OidType]?: DecoderFunction;
};

/**
 * Control the behavior of decoding and encoding
 */
export type ClientControls = {
  /**
   * Debugging options
   */
  debug?: DebugControls;
  /**
   * The strategy to use when decoding text results data
   *
   * `string` : all text values are returned as string, and the user has to take care of parsing
   * `auto` : text values are parsed into the types of this library, values of unknown types are still returned as strings
   *
   * Binary values are always read by their codec.
   *
   * Default: `auto`
   */
  decodeStrategy?: DecodeStrategy;

  /**
   * A dictionary of functions used to decode (parse) text column field values to a custom type. These functions will
   * take precedence over the {@linkcode ClientControls.decodeStrategy}. Each key in the dictionary is the column OID type number or
   * name, and the value is the decoder function. You can use the `Oid` object to set the decoder functions.
   *
   * @example
   * ```ts
   * import { Circle, Oid, type Decoders } from "../mod.ts";
   *
   * const decoders: Decoders = {
   *   // 718 = Oid.circle : keep the circle radius only
   *   718: (value: string) => Circle.parse(value).radius,
   *   // timestamps as native dates
   *   timestamp: (value: string) => new Date(value),
   *   [Oid.float8]: (value: string) => Number(value),
   * };
   * ```
   */
  decoders?: Decoders;
};
