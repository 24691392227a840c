function viewOf(buffer: Uint8Array): DataView {
  return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

export function readInt32BE(buffer: Uint8Array, offset: number): number {
  offset = offset >>> 0;

  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  );
}

export function readBigInt64BE(buffer: Uint8Array, offset: number): bigint {
  return viewOf(buffer).getBigInt64(offset >>> 0);
}

export function readDoubleBE(buffer: Uint8Array, offset: number): number {
  return viewOf(buffer).getFloat64(offset >>> 0);
}

export function writeBigInt64BE(
  buffer: Uint8Array,
  value: bigint,
  offset: number,
): void {
  viewOf(buffer).setBigInt64(offset >>> 0, value);
}

export function writeDoubleBE(
  buffer: Uint8Array,
  value: number,
  offset: number,
): void {
  viewOf(buffer).setFloat64(offset >>> 0, value);
}

/**
 * The host's standard UTC offset in minutes east of UTC, daylight saving
 * time left out
 */
export function getStandardUtcOffset(): number {
  const year = new Date().getFullYear();
  // in JS timezone offsets are reversed, ie. timezones
  // that are "positive" (+01:00) are represented as negative
  // offsets and vice-versa
  const january = new Date(year, 0, 1).getTimezoneOffset();
  const july = new Date(year, 6, 1).getTimezoneOffset();
  return -Math.max(january, july);
}
