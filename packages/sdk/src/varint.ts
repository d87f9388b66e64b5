/**
 * Unsigned LEB128 varints used for lengths in frames and table entries
 *
 * Values are limited to Number.MAX_SAFE_INTEGER, which fits in 8 bytes.
 * Arithmetic avoids 32-bit bitwise operators so lengths above 2^31 survive.
 */

import { DecodeError, EncodeError } from "./errors.js";

/**
 * Longest encoding accepted by decodeVarint
 */
export const MAX_VARINT_BYTES = 8;

/**
 * Number of bytes encodeVarint produces for a value
 */
export function varintLength(value: number): number {
  let length = 1;
  let rest = Math.floor(value / 128);
  while (rest > 0) {
    length++;
    rest = Math.floor(rest / 128);
  }
  return length;
}

/**
 * Encode a non-negative safe integer
 * @throws EncodeError for negative, fractional or unsafe values
 */
export function encodeVarint(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EncodeError(`varint value out of range: ${value}`);
  }

  const out = new Uint8Array(varintLength(value));
  writeVarint(out, 0, value);
  return out;
}

/**
 * Write a varint into `target` at `offset`
 * @returns Offset just past the written bytes
 */
export function writeVarint(target: Uint8Array, offset: number, value: number): number {
  let rest = value;
  let pos = offset;
  while (rest >= 128) {
    target[pos++] = (rest % 128) | 0x80;
    rest = Math.floor(rest / 128);
  }
  target[pos++] = rest;
  return pos;
}

/**
 * Result of reading a varint from a buffer
 */
export interface VarintRead {
  value: number;
  /** Offset just past the varint */
  next: number;
}

/**
 * Read a varint starting at `offset`
 * @returns The value, or null when the buffer ends before the varint does
 * @throws DecodeError when the varint is longer than MAX_VARINT_BYTES or unsafe
 */
export function readVarint(source: Uint8Array, offset: number): VarintRead | null {
  let value = 0;
  let scale = 1;

  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const pos = offset + i;
    if (pos >= source.length) {
      return null;
    }
    const byte = source[pos] ?? 0;
    value += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) {
      if (!Number.isSafeInteger(value)) {
        throw new DecodeError(`varint at offset ${offset} exceeds the safe integer range`);
      }
      return { value, next: pos + 1 };
    }
    scale *= 128;
  }

  throw new DecodeError(`varint at offset ${offset} is longer than ${MAX_VARINT_BYTES} bytes`);
}

/**
 * Read a varint that must be complete
 * @throws DecodeError when the buffer is truncated
 */
export function decodeVarint(source: Uint8Array, offset = 0): VarintRead {
  const read = readVarint(source, offset);
  if (!read) {
    throw new DecodeError(`truncated varint at offset ${offset}`);
  }
  return read;
}
