/**
 * Table file entry layout
 *
 * A table file is a sequence of entries:
 *   [type_tag: 1 byte][key_length: varint][key_bytes][payload_length: varint][payload_bytes]
 *
 * A tombstone is an entry with tag 0x00 and an empty payload. The id counter
 * is an entry with tag 0x0f, an empty key and the next id as ASCII digits.
 * Every other entry has a non-empty key.
 */

import { tags } from "./codec.js";
import { DecodeError } from "./errors.js";
import { readVarint, varintLength, writeVarint } from "./varint.js";

/**
 * Entry tag of the id counter; codecs may not produce it
 */
export const COUNTER_TAG = 0x0f;

/**
 * Location and shape of one entry inside a table file
 */
export interface EntryLocation {
  /** Type tag of the record (tags.tombstone for deletions) */
  tag: number;
  /** Offset of the first byte of the entry */
  offset: number;
  /** Total size of the entry in bytes */
  length: number;
  /** Offset of the first payload byte */
  payloadOffset: number;
  payloadLength: number;
}

/**
 * A parsed entry together with its key bytes
 */
export interface ParsedEntry extends EntryLocation {
  key: Uint8Array;
}

/**
 * Serialize one entry
 */
export function encodeEntry(tag: number, key: Uint8Array, payload: Uint8Array): Uint8Array {
  const size =
    1 + varintLength(key.length) + key.length + varintLength(payload.length) + payload.length;
  const out = new Uint8Array(size);
  out[0] = tag;
  let pos = writeVarint(out, 1, key.length);
  out.set(key, pos);
  pos += key.length;
  pos = writeVarint(out, pos, payload.length);
  out.set(payload, pos);
  return out;
}

/**
 * Serialize a tombstone for `key`
 */
export function encodeTombstone(key: Uint8Array): Uint8Array {
  return encodeEntry(tags.tombstone, key, new Uint8Array(0));
}

/**
 * Serialize an id counter entry
 */
export function encodeCounter(nextId: number): Uint8Array {
  return encodeEntry(COUNTER_TAG, new Uint8Array(0), new TextEncoder().encode(String(nextId)));
}

/**
 * Read the value of an id counter entry's payload
 * @throws DecodeError unless the payload is a non-negative ASCII integer
 */
export function decodeCounter(payload: Uint8Array, offset: number): number {
  const text = String.fromCharCode(...payload);
  const value = Number(text);
  if (!/^\d{1,16}$/.test(text) || !Number.isSafeInteger(value)) {
    throw new DecodeError(`id counter at offset ${offset} is not an integer: "${text}"`);
  }
  return value;
}

/**
 * Parse the entry starting at `offset`
 *
 * `base` is the file offset of `buffer[0]`, so reported offsets are file offsets.
 * @returns The entry, or null when the buffer ends inside it or a record
 *   has an empty key (a torn tail)
 * @throws DecodeError when a length varint is malformed
 */
export function parseEntry(buffer: Uint8Array, offset: number, base = 0): ParsedEntry | null {
  const tag = buffer[offset];
  if (tag === undefined) {
    return null;
  }

  const keyLength = readVarint(buffer, offset + 1);
  if (!keyLength) {
    return null;
  }
  if (keyLength.value === 0 && tag !== COUNTER_TAG) {
    return null;
  }
  const keyEnd = keyLength.next + keyLength.value;
  if (keyEnd > buffer.length) {
    return null;
  }

  const payloadLength = readVarint(buffer, keyEnd);
  if (!payloadLength) {
    return null;
  }
  const end = payloadLength.next + payloadLength.value;
  if (end > buffer.length) {
    return null;
  }

  if (tag === tags.tombstone && payloadLength.value !== 0) {
    throw new DecodeError(`tombstone at offset ${base + offset} has a ${payloadLength.value}-byte payload`);
  }

  if (tag === COUNTER_TAG && keyLength.value !== 0) {
    throw new DecodeError(`id counter at offset ${base + offset} has a ${keyLength.value}-byte key`);
  }

  return {
    tag,
    key: buffer.subarray(keyLength.next, keyEnd),
    offset: base + offset,
    length: end - offset,
    payloadOffset: base + payloadLength.next,
    payloadLength: payloadLength.value,
  };
}
