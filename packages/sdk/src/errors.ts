/**
 * Error types for bucket operations
 *
 * Invariants:
 * - All errors include the affected path, table or key in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all bucket errors
 */
export abstract class BucketError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * File system operation names reported by IoError
 */
export type IoOperation =
  | "open"
  | "read"
  | "write"
  | "sync"
  | "truncate"
  | "close"
  | "stat"
  | "mkdir"
  | "readdir"
  | "rename"
  | "unlink";

/**
 * Thrown when a file system call fails (permission, disk full, missing path)
 */
export class IoError extends BucketError {
  readonly code = "IO_ERROR";
  /** errno code of the underlying failure, when there is one (e.g. "ENOSPC") */
  readonly errno: string | undefined;

  constructor(
    public readonly operation: IoOperation,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    const errno = errnoOf(options?.cause);
    super(`I/O error during ${operation}${errno ? ` (${errno})` : ""}: ${path}`, options);
    this.errno = errno;
  }
}

/**
 * Thrown when a key or value cannot be encoded
 */
export class EncodeError extends BucketError {
  readonly code: string = "ENCODE_ERROR";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Failed to encode: ${reason}`, options);
  }
}

/**
 * A single schema violation reported for a structured record
 */
export interface SchemaIssue {
  /** JSON Pointer to the failing field ("" for the root) */
  pointer: string;
  message: string;
}

/**
 * Thrown when a structured record does not satisfy its schema
 */
export class SchemaValidationError extends EncodeError {
  override readonly code = "SCHEMA_VALIDATION";

  constructor(
    public readonly schema: string,
    public readonly issues: SchemaIssue[],
    options?: ErrorOptions
  ) {
    const first = issues[0];
    super(
      `record does not match schema "${schema}"` +
        (first ? `: ${first.pointer || "/"} ${first.message}` : ""),
      options
    );
  }
}

/**
 * Thrown when stored bytes are truncated, corrupt or carry an unknown tag
 */
export class DecodeError extends BucketError {
  readonly code = "DECODE_ERROR";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Failed to decode: ${reason}`, options);
  }
}

/**
 * Thrown when a bucket or table is used after close()
 */
export class ClosedError extends BucketError {
  readonly code = "CLOSED";

  constructor(target: string, options?: ErrorOptions) {
    super(`Cannot use closed ${target}`, options);
  }
}

/**
 * Thrown when dropping or requiring a table that does not exist
 */
export class NoSuchTableError extends BucketError {
  readonly code = "NO_SUCH_TABLE";

  constructor(
    public readonly table: string,
    options?: ErrorOptions
  ) {
    super(`Table "${table}" does not exist`, options);
  }
}

/**
 * Thrown by getOrThrow() when the key has no live record
 */
export class NoSuchKeyError extends BucketError {
  readonly code = "NO_SUCH_KEY";

  constructor(
    public readonly table: string,
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key "${key}" not found in table "${table}"`, options);
  }
}

/**
 * Thrown when a table name cannot be mapped to a file
 */
export class InvalidNameError extends BucketError {
  readonly code = "INVALID_NAME";

  constructor(name: string, reason: string, options?: ErrorOptions) {
    super(`Invalid table name "${name}": ${reason}`, options);
  }
}

/**
 * Thrown when bucket options fail validation
 */
export class ConfigError extends BucketError {
  readonly code = "INVALID_OPTIONS";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid bucket options: ${issues.join("; ")}`, options);
  }
}

/**
 * Extract the errno code ("ENOENT", "ENOSPC", ...) from a thrown value
 */
export function errnoOf(err: unknown): string | undefined {
  if (err instanceof IoError) {
    return err.errno;
  }
  if (err instanceof BucketError) {
    return undefined;
  }
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
