/**
 * Validation utilities for table names and keys
 */

import { encodeUtf8 } from "./codec.js";
import { EncodeError, InvalidNameError } from "./errors.js";

/**
 * Valid characters for table names: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Longest table name accepted (leaves room for the extension and temp suffixes)
 */
const MAX_NAME_LENGTH = 200;

/**
 * Windows reserved device names (case-insensitive)
 */
const WINDOWS_RESERVED_NAMES = new Set([
  "con",
  "prn",
  "aux",
  "nul",
  "com1",
  "com2",
  "com3",
  "com4",
  "com5",
  "com6",
  "com7",
  "com8",
  "com9",
  "lpt1",
  "lpt2",
  "lpt3",
  "lpt4",
  "lpt5",
  "lpt6",
  "lpt7",
  "lpt8",
  "lpt9",
]);

/**
 * Validate a table name so it maps to exactly one file inside the bucket root
 * @throws InvalidNameError if invalid
 */
export function validateTableName(name: string): void {
  if (typeof name !== "string" || name.length === 0) {
    throw new InvalidNameError(String(name), "must be a non-empty string");
  }

  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidNameError(name, `must be at most ${MAX_NAME_LENGTH} characters`);
  }

  if (!VALID_NAME_PATTERN.test(name)) {
    throw new InvalidNameError(
      name,
      "only alphanumeric, underscore, dash, and dot are allowed"
    );
  }

  if (name.startsWith(".") || name.startsWith("-")) {
    throw new InvalidNameError(name, 'cannot start with "." or "-"');
  }

  if (name.includes("..")) {
    throw new InvalidNameError(name, 'cannot contain ".."');
  }

  // Windows: reject trailing dots
  if (name.endsWith(".")) {
    throw new InvalidNameError(name, 'cannot end with "."');
  }

  const baseName = (name.split(".")[0] ?? name).toLowerCase();
  if (WINDOWS_RESERVED_NAMES.has(baseName)) {
    throw new InvalidNameError(name, "cannot be a Windows reserved device name");
  }
}

/**
 * Convert a key to its stored UTF-8 bytes
 * @throws EncodeError for empty, malformed or oversized keys
 */
export function encodeKey(key: string, maxKeyBytes: number): Uint8Array {
  if (typeof key !== "string" || key.length === 0) {
    throw new EncodeError("key must be a non-empty string");
  }

  const bytes = encodeUtf8(key, "key");
  if (bytes.length > maxKeyBytes) {
    throw new EncodeError(`key is ${bytes.length} bytes, limit is ${maxKeyBytes}`);
  }
  return bytes;
}

/**
 * Compare two keys by their UTF-8 bytes
 */
export function compareKeyBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return a.length - b.length;
}
