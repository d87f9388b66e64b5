/**
 * Core types for bucketdb
 */

import type { SyncFileSystem } from "./io.js";

/**
 * Any value JSON can represent
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A free-form JSON mapping
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A record tagged with the id of the schema that describes it
 *
 * The id travels with the record on disk, so decoding never needs the schema
 * itself; `schemaCodec` uses it to check that a record belongs to its table.
 */
export class Structured<T extends JsonValue = JsonValue> {
  constructor(
    public readonly schema: string,
    public readonly data: T
  ) {}
}

/**
 * Values the default codec stores: unstructured JSON, raw bytes, or schema-tagged records
 */
export type TableValue = JsonValue | Uint8Array | Structured;

/**
 * Converts values of type T to self-describing frames and back
 *
 * A frame is `[tag: 1 byte][payload_length: varint][payload]`.
 */
export interface Codec<T> {
  /** Human-readable codec name used in error messages */
  readonly name: string;
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

/**
 * Thresholds for compacting a table after a write
 */
export interface AutoCompactOptions {
  /** Fraction of the file occupied by superseded entries and tombstones (default: 0.5) */
  minGarbageRatio?: number;
  /** Smallest file size worth compacting, in bytes (default: 65536) */
  minFileBytes?: number;
  /** Smallest number of entries in the file worth compacting (default: 8) */
  minEntries?: number;
}

/**
 * Configuration options for opening a bucket
 */
export interface BucketOptions {
  /** Root directory holding one file per table */
  root: string;
  /** Flush each write to stable storage before returning (default: true) */
  fsync?: boolean;
  /** File extension for table files (default: ".tbl") */
  extension?: string;
  /** Maximum UTF-8 length of a key (default: 1024, max: 65535) */
  maxKeyBytes?: number;
  /** Maximum encoded size of a single record (default: 16 MiB) */
  maxRecordBytes?: number;
  /** Compact tables automatically once enough space is garbage (default: off) */
  autoCompact?: AutoCompactOptions;
  /** File system used for all table I/O (default: node:fs) */
  fs?: SyncFileSystem;
}

/**
 * Bucket options after validation and defaults
 */
export interface ResolvedBucketOptions {
  root: string;
  fsync: boolean;
  extension: string;
  maxKeyBytes: number;
  maxRecordBytes: number;
  autoCompact: Required<AutoCompactOptions> | null;
  fs: SyncFileSystem;
}

/**
 * Options for iterating a table
 */
export interface ScanOptions {
  /** "storage" (default) follows file order; "key" sorts by UTF-8 key bytes */
  order?: "storage" | "key";
  /** Only visit keys starting with this prefix */
  prefix?: string;
}

/**
 * Space accounting for a table file
 */
export interface TableStats {
  /** Keys with a live record */
  liveRecords: number;
  /** Entries in the file, including superseded ones and tombstones */
  totalEntries: number;
  /** Current file size in bytes */
  fileBytes: number;
  /** Bytes held by superseded entries and tombstones */
  garbageBytes: number;
}

/**
 * Outcome of a compaction
 */
export interface CompactionResult {
  bytesBefore: number;
  bytesAfter: number;
  liveRecords: number;
  reclaimedBytes: number;
}
