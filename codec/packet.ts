/*!
 * Adapted directly from https://github.com/brianc/node-buffer-writer
 * which is licensed as follows:
 *
 * The MIT License (MIT)
 *
 *
 * Permission is hereby granted, free of charge, to any person obtaining
 * a copy of this software and associated documentation files (the
 * 'Software'), to deal in the Software without restriction, including
 * without limitation the rights to use, copy, modify, merge, publish,
 * distribute, sublicense, and/or sell copies of the Software, and to
 * permit persons to whom the Software is furnished to do so, subject to
 * the following conditions:
 *
 * The above copyright notice and this permission notice shall be
 * included in all copies or substantial portions of the Software.
 *
 * THE SOFTWARE IS PROVIDED 'AS IS', WITHOUT WARRANTY OF ANY KIND,
 * EXPRESS OR IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF
 * MERCHANTABILITY, FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT.
 * IN NO EVENT SHALL THE AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY
 * CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT,
 * TORT OR OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE
 * SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.
 */

import { ProtocolError } from "../error.ts";
import {
  readBigInt64BE,
  readDoubleBE,
  readInt32BE,
  writeBigInt64BE,
  writeDoubleBE,
} from "../utils/utils.ts";

/**
 * Sequential big-endian reads over the bytes of a single field value
 */
export class PacketReader {
  #buffer: Uint8Array;
  #offset = 0;

  constructor(buffer: Uint8Array) {
    this.#buffer = buffer;
  }

  get remaining(): number {
    return this.#buffer.length - this.#offset;
  }

  #advance(size: number): number {
    if (this.remaining < size) {
      throw new ProtocolError(
        `Can't read ${size} bytes, only ${this.remaining} left in the buffer`,
      );
    }
    const start = this.#offset;
    this.#offset += size;
    return start;
  }

  readInt32(): number {
    return readInt32BE(this.#buffer, this.#advance(4));
  }

  readInt64(): bigint {
    return readBigInt64BE(this.#buffer, this.#advance(8));
  }

  readDouble(): number {
    return readDoubleBE(this.#buffer, this.#advance(8));
  }
}

/**
 * Sequential big-endian writes into a growing buffer
 */
export class PacketWriter {
  #buffer: Uint8Array;
  #offset = 0;

  constructor(size?: number) {
    this.#buffer = new Uint8Array(size || 64);
  }

  get byteLength(): number {
    return this.#offset;
  }

  #ensure(size: number) {
    const remaining = this.#buffer.length - this.#offset;
    if (remaining < size) {
      const oldBuffer = this.#buffer;
      // exponential growth factor of around ~ 1.5
      // https://stackoverflow.com/questions/2269063/#buffer-growth-strategy
      const newSize = oldBuffer.length + (oldBuffer.length >> 1) + size;
      this.#buffer = new Uint8Array(newSize);
      this.#buffer.set(oldBuffer);
    }
  }

  addInt32(num: number) {
    this.#ensure(4);
    this.#buffer[this.#offset++] = (num >>> 24) & 0xff;
    this.#buffer[this.#offset++] = (num >>> 16) & 0xff;
    this.#buffer[this.#offset++] = (num >>> 8) & 0xff;
    this.#buffer[this.#offset++] = (num >>> 0) & 0xff;
    return this;
  }

  addInt64(num: bigint) {
    this.#ensure(8);
    writeBigInt64BE(this.#buffer, num, this.#offset);
    this.#offset += 8;
    return this;
  }

  addDouble(num: number) {
    this.#ensure(8);
    writeDoubleBE(this.#buffer, num, this.#offset);
    this.#offset += 8;
    return this;
  }

  clear() {
    this.#offset = 0;
  }

  join() {
    return this.#buffer.slice(0, this.#offset);
  }

  flush() {
    const result = this.join();
    this.clear();
    return result;
  }
}
