/**
 * Segment deletion bitmap
 *
 *   count:varint bits{ceil(count / 8)}
 *
 * Row i is deleted when bit (i & 7) of byte (i >> 3) is set. A zero-length
 * buffer means nothing in the segment has been deleted.
 */

import { DecodeError } from '../errors.js';
import { ByteReader, ByteWriter } from './io.js';

export function decodeDeletions(data: Uint8Array): boolean[] {
  if (data.length === 0) {
    return [];
  }
  const reader = new ByteReader(data);
  const count = reader.readVarint('deletion count');
  const bits = reader.readBytes(Math.ceil(count / 8), 'deletion bitmap');
  if (!reader.atEnd) {
    throw new DecodeError(`${reader.remaining} trailing bytes after deletion bitmap`, reader.offset);
  }

  const mask: boolean[] = [];
  for (let i = 0; i < count; i++) {
    mask.push(((bits[i >> 3] >> (i & 7)) & 1) === 1);
  }
  return mask;
}

export function encodeDeletions(mask: readonly boolean[]): Uint8Array {
  if (mask.length === 0) {
    return new Uint8Array(0);
  }
  const bits = new Uint8Array(Math.ceil(mask.length / 8));
  mask.forEach((deleted, i) => {
    if (deleted) {
      bits[i >> 3] |= 1 << (i & 7);
    }
  });
  const writer = new ByteWriter();
  writer.writeVarint(mask.length);
  writer.write(bits);
  return writer.finish();
}
