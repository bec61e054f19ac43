/**
 * Byte-level I/O for page decoding and encoding.
 *
 * Numerics are big-endian; lengths and counts are unsigned LEB128 varints.
 */

import { DecodeError } from '../errors.js';

const VarInt = {
  /** Continuation bit - if set, more bytes follow */
  CONT_BIT: 0x80,
  /** Lower 7 bits carry data */
  DATA_MASK: 0x7f,
  /** 8 groups of 7 bits covers Number.MAX_SAFE_INTEGER */
  MAX_BYTES: 8,
} as const;

export const TEXT_ENCODER = new TextEncoder();

const STRICT_UTF8 = new TextDecoder('utf-8', { fatal: true });

export class ByteReader {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  offset = 0;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  get atEnd(): boolean {
    return this.offset >= this.buffer.length;
  }

  ensureAvailable(bytes: number, what: string): void {
    if (bytes > this.remaining) {
      throw new DecodeError(
        `Truncated ${what}: need ${bytes} bytes, only ${this.remaining} available`,
        this.offset
      );
    }
  }

  readU8(what = 'byte'): number {
    this.ensureAvailable(1, what);
    return this.buffer[this.offset++];
  }

  readVarint(what = 'varint'): number {
    const start = this.offset;
    let result = 0;
    let scale = 1;
    for (let i = 0; i < VarInt.MAX_BYTES; i++) {
      if (this.atEnd) {
        throw new DecodeError(`Truncated ${what}`, start);
      }
      const byte = this.buffer[this.offset++];
      result += (byte & VarInt.DATA_MASK) * scale;
      if ((byte & VarInt.CONT_BIT) === 0) {
        if (!Number.isSafeInteger(result)) {
          break;
        }
        return result;
      }
      scale *= 128;
    }
    throw new DecodeError(`${what} exceeds the safe integer range`, start);
  }

  readBytes(length: number, what = 'bytes'): Uint8Array {
    this.ensureAvailable(length, what);
    const res = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return res;
  }

  readString(what = 'string'): string {
    const length = this.readVarint(`${what} length`);
    const start = this.offset;
    const bytes = this.readBytes(length, what);
    try {
      return STRICT_UTF8.decode(bytes);
    } catch (error) {
      throw new DecodeError(`Invalid UTF-8 in ${what}: ${error instanceof Error ? error.message : String(error)}`, start);
    }
  }

  readI64BE(what = 'int64'): bigint {
    this.ensureAvailable(8, what);
    const val = this.view.getBigInt64(this.offset, false);
    this.offset += 8;
    return val;
  }

  readF32BE(what = 'float32'): number {
    this.ensureAvailable(4, what);
    const val = this.view.getFloat32(this.offset, false);
    this.offset += 4;
    return val;
  }

  readF64BE(what = 'float64'): number {
    this.ensureAvailable(8, what);
    const val = this.view.getFloat64(this.offset, false);
    this.offset += 8;
    return val;
  }
}

export class ByteWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialSize = 256) {
    this.buffer = new Uint8Array(initialSize);
    this.view = new DataView(this.buffer.buffer);
  }

  private ensure(bytes: number): void {
    const needed = this.offset + bytes;
    if (needed <= this.buffer.length) return;
    const newBuffer = new Uint8Array(Math.max(this.buffer.length * 2, needed));
    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  write(chunk: Uint8Array): void {
    this.ensure(chunk.length);
    this.buffer.set(chunk, this.offset);
    this.offset += chunk.length;
  }

  writeU8(v: number): void {
    this.ensure(1);
    this.buffer[this.offset++] = v;
  }

  writeVarint(value: number): void {
    this.ensure(VarInt.MAX_BYTES);
    let v = value;
    while (v >= VarInt.CONT_BIT) {
      this.buffer[this.offset++] = (v % 128) | VarInt.CONT_BIT;
      v = Math.floor(v / 128);
    }
    this.buffer[this.offset++] = v;
  }

  writeString(value: string): void {
    const encoded = TEXT_ENCODER.encode(value);
    this.writeVarint(encoded.length);
    this.write(encoded);
  }

  writeI64BE(v: bigint): void {
    this.ensure(8);
    this.view.setBigInt64(this.offset, v, false);
    this.offset += 8;
  }

  writeF32BE(v: number): void {
    this.ensure(4);
    this.view.setFloat32(this.offset, v, false);
    this.offset += 4;
  }

  writeF64BE(v: number): void {
    this.ensure(8);
    this.view.setFloat64(this.offset, v, false);
    this.offset += 8;
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
