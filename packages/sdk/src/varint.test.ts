import { describe, it, expect } from "vitest";
import { decodeVarint, encodeVarint, readVarint, varintLength, writeVarint } from "./varint.js";
import { DecodeError, EncodeError } from "./errors.js";

describe("varint", () => {
  it("should encode small values in one byte", () => {
    expect([...encodeVarint(0)]).toEqual([0]);
    expect([...encodeVarint(1)]).toEqual([1]);
    expect([...encodeVarint(127)]).toEqual([0x7f]);
  });

  it("should encode multi-byte values little-endian with continuation bits", () => {
    expect([...encodeVarint(128)]).toEqual([0x80, 0x01]);
    expect([...encodeVarint(300)]).toEqual([0xac, 0x02]);
    expect([...encodeVarint(16384)]).toEqual([0x80, 0x80, 0x01]);
  });

  it("should handle values above 2^31 without overflow", () => {
    const value = 2 ** 40 + 5;
    expect(decodeVarint(encodeVarint(value)).value).toBe(value);
  });

  it("should fit Number.MAX_SAFE_INTEGER in 8 bytes", () => {
    const bytes = encodeVarint(Number.MAX_SAFE_INTEGER);
    expect(bytes.length).toBe(8);
    expect(decodeVarint(bytes)).toEqual({ value: Number.MAX_SAFE_INTEGER, next: 8 });
  });

  it("should report encoded length", () => {
    expect(varintLength(0)).toBe(1);
    expect(varintLength(127)).toBe(1);
    expect(varintLength(128)).toBe(2);
    expect(varintLength(2 ** 21)).toBe(4);
  });

  it("should reject negative, fractional and unsafe values", () => {
    expect(() => encodeVarint(-1)).toThrow(EncodeError);
    expect(() => encodeVarint(1.5)).toThrow(EncodeError);
    expect(() => encodeVarint(2 ** 53)).toThrow(EncodeError);
    expect(() => encodeVarint(Number.NaN)).toThrow(EncodeError);
  });

  it("should write at an offset and return the next offset", () => {
    const target = new Uint8Array(4);
    const next = writeVarint(target, 1, 300);
    expect(next).toBe(3);
    expect([...target]).toEqual([0, 0xac, 0x02, 0]);
  });

  it("should decode from an offset", () => {
    const source = new Uint8Array([0xff, 0xac, 0x02, 0x09]);
    expect(decodeVarint(source, 1)).toEqual({ value: 300, next: 3 });
  });

  it("should return null from readVarint when the buffer ends mid-varint", () => {
    expect(readVarint(new Uint8Array([0x80]), 0)).toBeNull();
    expect(readVarint(new Uint8Array([]), 0)).toBeNull();
  });

  it("should throw DecodeError from decodeVarint on truncation", () => {
    expect(() => decodeVarint(new Uint8Array([0x80, 0x80]))).toThrow(
      "Failed to decode: truncated varint at offset 0"
    );
  });

  it("should reject varints longer than 8 bytes", () => {
    const bytes = new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x01]);
    expect(() => decodeVarint(bytes)).toThrow(DecodeError);
    expect(() => decodeVarint(bytes)).toThrow("longer than 8 bytes");
  });

  it("should reject 8-byte varints beyond the safe integer range", () => {
    const bytes = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x7f]);
    expect(() => decodeVarint(bytes)).toThrow("exceeds the safe integer range");
  });
});
