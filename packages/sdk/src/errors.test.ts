import { describe, it, expect } from "vitest";
import {
  BucketError,
  ClosedError,
  ConfigError,
  DecodeError,
  EncodeError,
  InvalidNameError,
  IoError,
  NoSuchKeyError,
  NoSuchTableError,
  SchemaValidationError,
  errnoOf,
} from "./errors.js";

describe("errors", () => {
  it("should include operation, errno and path in IoError", () => {
    const cause = Object.assign(new Error("no space left"), { code: "ENOSPC" });
    const err = new IoError("write", "/data/users.tbl", { cause });

    expect(err.message).toBe("I/O error during write (ENOSPC): /data/users.tbl");
    expect(err.code).toBe("IO_ERROR");
    expect(err.errno).toBe("ENOSPC");
    expect(err.operation).toBe("write");
    expect(err.path).toBe("/data/users.tbl");
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("IoError");
  });

  it("should omit errno when the cause has none", () => {
    const err = new IoError("open", "/data/users.tbl");
    expect(err.message).toBe("I/O error during open: /data/users.tbl");
    expect(err.errno).toBeUndefined();
  });

  it("should give every error a stable code", () => {
    const errors: Array<[BucketError, string]> = [
      [new EncodeError("bad"), "ENCODE_ERROR"],
      [new SchemaValidationError("user@1", []), "SCHEMA_VALIDATION"],
      [new DecodeError("bad"), "DECODE_ERROR"],
      [new ClosedError("bucket"), "CLOSED"],
      [new NoSuchTableError("users"), "NO_SUCH_TABLE"],
      [new NoSuchKeyError("users", "u1"), "NO_SUCH_KEY"],
      [new InvalidNameError("a/b", "bad"), "INVALID_NAME"],
      [new ConfigError(["root: required"]), "INVALID_OPTIONS"],
    ];
    for (const [err, code] of errors) {
      expect(err.code).toBe(code);
      expect(err).toBeInstanceOf(BucketError);
      expect(err).toBeInstanceOf(Error);
    }
  });

  it("should make SchemaValidationError a kind of EncodeError", () => {
    const err = new SchemaValidationError("user@1", [{ pointer: "/name", message: "Required" }]);
    expect(err).toBeInstanceOf(EncodeError);
    expect(err.message).toBe('Failed to encode: record does not match schema "user@1": /name Required');
    expect(err.name).toBe("SchemaValidationError");
  });

  it("should report the root pointer as /", () => {
    const err = new SchemaValidationError("n@1", [{ pointer: "", message: "Expected number" }]);
    expect(err.message).toBe('Failed to encode: record does not match schema "n@1": / Expected number');
  });

  it("should name the affected table and key", () => {
    expect(new NoSuchTableError("users").message).toBe('Table "users" does not exist');
    expect(new NoSuchKeyError("users", "u1").message).toBe('Key "u1" not found in table "users"');
    expect(new ClosedError('table "users"').message).toBe('Cannot use closed table "users"');
    expect(new ConfigError(["a", "b"]).message).toBe("Invalid bucket options: a; b");
  });

  it("should extract errno codes", () => {
    expect(errnoOf(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(errnoOf(new Error("x"))).toBeUndefined();
    expect(errnoOf("ENOENT")).toBeUndefined();
  });
});
