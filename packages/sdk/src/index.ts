/**
 * bucketdb SDK
 *
 * A synchronous, file-backed key-value store with structured record support
 */

// Re-export types
export type {
  JsonValue,
  JsonObject,
  TableValue,
  Codec,
  BucketOptions,
  ResolvedBucketOptions,
  AutoCompactOptions,
  ScanOptions,
  TableStats,
  CompactionResult,
} from "./types.js";
export { Structured } from "./types.js";

// Bucket and tables
export { Bucket, openBucket, withBucket } from "./bucket.js";
export { Table } from "./table.js";

// Codecs
export {
  valueCodec,
  jsonCodec,
  bytesCodec,
  schemaCodec,
  defineCodec,
  frame,
  unframe,
  tags,
  CUSTOM_TAG_MIN,
  CUSTOM_TAG_MAX,
} from "./codec.js";
export type { CodecDefinition, Frame } from "./codec.js";
export { encodeVarint, decodeVarint } from "./varint.js";

// Configuration
export {
  BucketOptionsSchema,
  resolveOptions,
  DEFAULT_AUTO_COMPACT,
  DEFAULT_EXTENSION,
  DEFAULT_MAX_KEY_BYTES,
  DEFAULT_MAX_RECORD_BYTES,
} from "./config.js";

// File system port
export { nodeFileSystem } from "./io.js";
export type { SyncFileSystem, FileInfo } from "./io.js";

// Observability
export { logger, Logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { TableMetrics, TableOperation } from "./observability/metrics.js";

// Re-export errors
export {
  BucketError,
  IoError,
  EncodeError,
  SchemaValidationError,
  DecodeError,
  ClosedError,
  NoSuchTableError,
  NoSuchKeyError,
  InvalidNameError,
  ConfigError,
} from "./errors.js";
export type { IoOperation, SchemaIssue } from "./errors.js";
