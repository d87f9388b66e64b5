/**
 * Record codecs: self-describing frames for stored values
 *
 * Frame layout: [tag: 1 byte][payload_length: varint][payload]
 *
 * Invariants:
 * - decode(encode(v)) deep-equals v for every value the codec accepts
 * - Tag 0x00 is reserved for tombstones and never produced by a codec
 * - Decoding rejects truncated frames, trailing bytes and unknown tags
 */

import type { z } from "zod";
import { BucketError, DecodeError, EncodeError, SchemaValidationError } from "./errors.js";
import type { Codec, JsonValue, TableValue } from "./types.js";
import { Structured } from "./types.js";
import { decodeVarint, varintLength, writeVarint } from "./varint.js";

/**
 * Type tags understood by the built-in codecs
 */
export const tags = {
  tombstone: 0x00,
  json: 0x01,
  structured: 0x02,
  bytes: 0x03,
} as const;

/**
 * Lowest tag available to defineCodec
 */
export const CUSTOM_TAG_MIN = 0x10;

/**
 * Highest tag value (tags are one byte)
 */
export const CUSTOM_TAG_MAX = 0xff;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Encode a string as UTF-8, rejecting lone surrogates
 * @throws EncodeError if the string is not well-formed UTF-16
 */
export function encodeUtf8(text: string, label = "string"): Uint8Array {
  const bytes = utf8Encoder.encode(text);
  // TextEncoder silently replaces lone surrogates with U+FFFD
  if (bytes.includes(0xef) && utf8Decoder.decode(bytes) !== text) {
    throw new EncodeError(`${label} contains unpaired surrogates`);
  }
  return bytes;
}

/**
 * Decode strict UTF-8
 * @throws DecodeError on malformed sequences
 */
export function decodeUtf8(bytes: Uint8Array, label = "text"): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new DecodeError(`${label} is not valid UTF-8`, { cause: err });
  }
}

/**
 * Wrap a payload in a frame
 */
export function frame(tag: number, payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(1 + varintLength(payload.length) + payload.length);
  out[0] = tag;
  const start = writeVarint(out, 1, payload.length);
  out.set(payload, start);
  return out;
}

/**
 * A frame split into its parts
 */
export interface Frame {
  tag: number;
  payload: Uint8Array;
}

/**
 * Split a frame into tag and payload (payload is a view, not a copy)
 * @throws DecodeError if the frame is truncated or has trailing bytes
 */
export function unframe(bytes: Uint8Array): Frame {
  const tag = bytes[0];
  if (tag === undefined) {
    throw new DecodeError("empty frame");
  }
  const { value: length, next } = decodeVarint(bytes, 1);
  const end = next + length;
  if (end > bytes.length) {
    throw new DecodeError(`frame payload truncated: expected ${length} bytes, found ${bytes.length - next}`);
  }
  if (end < bytes.length) {
    throw new DecodeError(`frame has ${bytes.length - end} trailing bytes`);
  }
  return { tag, payload: bytes.subarray(next, end) };
}

/**
 * Check that a value is representable as JSON without loss
 * @throws EncodeError naming the offending location
 */
export function assertJsonValue(value: unknown, pointer = ""): asserts value is JsonValue {
  const ancestors = new Set<object>();

  const visit = (current: unknown, at: string): void => {
    switch (typeof current) {
      case "string":
      case "boolean":
        return;
      case "number":
        if (!Number.isFinite(current)) {
          throw new EncodeError(`non-finite number ${current} at ${at || "/"}`);
        }
        return;
      case "object":
        break;
      default:
        throw new EncodeError(`unsupported ${typeof current} at ${at || "/"}`);
    }

    if (current === null) {
      return;
    }
    if (ancestors.has(current)) {
      throw new EncodeError(`circular reference at ${at || "/"}`);
    }

    ancestors.add(current);
    try {
      if (Array.isArray(current)) {
        for (let i = 0; i < current.length; i++) {
          if (!(i in current)) {
            throw new EncodeError(`sparse array hole at ${at}/${i}`);
          }
          visit(current[i], `${at}/${i}`);
        }
        return;
      }

      const proto: unknown = Object.getPrototypeOf(current);
      if (proto !== Object.prototype && proto !== null) {
        const name = current.constructor?.name ?? "object";
        throw new EncodeError(`unsupported ${name} instance at ${at || "/"}`);
      }
      for (const [key, child] of Object.entries(current)) {
        visit(child, `${at}/${key}`);
      }
    } finally {
      ancestors.delete(current);
    }
  };

  visit(value, pointer);
}

function encodeJson(value: unknown, label: string): Uint8Array {
  assertJsonValue(value);
  return encodeUtf8(JSON.stringify(value), label);
}

function decodeJson(payload: Uint8Array, label: string): JsonValue {
  const text = decodeUtf8(payload, label);
  try {
    // JSON.parse only produces JSON values
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new DecodeError(`${label} is not valid JSON`, { cause: err });
  }
}

function encodeStructuredPayload(schema: string, data: unknown): Uint8Array {
  if (typeof schema !== "string" || schema.length === 0) {
    throw new EncodeError("structured record needs a non-empty schema id");
  }
  const schemaBytes = encodeUtf8(schema, "schema id");
  const json = encodeJson(data, "structured record");
  const out = new Uint8Array(varintLength(schemaBytes.length) + schemaBytes.length + json.length);
  const start = writeVarint(out, 0, schemaBytes.length);
  out.set(schemaBytes, start);
  out.set(json, start + schemaBytes.length);
  return out;
}

function decodeStructuredPayload(payload: Uint8Array): { schema: string; data: JsonValue } {
  const { value: schemaLength, next } = decodeVarint(payload, 0);
  if (next + schemaLength > payload.length) {
    throw new DecodeError("structured record schema id is truncated");
  }
  const schema = decodeUtf8(payload.subarray(next, next + schemaLength), "schema id");
  if (schema.length === 0) {
    throw new DecodeError("structured record has an empty schema id");
  }
  const data = decodeJson(payload.subarray(next + schemaLength), "structured record");
  return { schema, data };
}

function tagName(tag: number): string {
  return `0x${tag.toString(16).padStart(2, "0")}`;
}

/**
 * Default codec: unstructured JSON, raw bytes and schema-tagged records
 *
 * @example
 * ```typescript
 * const bytes = valueCodec.encode({ x: 1 });
 * valueCodec.decode(bytes); // { x: 1 }
 * ```
 */
export const valueCodec: Codec<TableValue> = {
  name: "value",

  encode(value: TableValue): Uint8Array {
    if (value instanceof Uint8Array) {
      return frame(tags.bytes, value);
    }
    if (value instanceof Structured) {
      return frame(tags.structured, encodeStructuredPayload(value.schema, value.data));
    }
    return frame(tags.json, encodeJson(value, "record"));
  },

  decode(bytes: Uint8Array): TableValue {
    const { tag, payload } = unframe(bytes);
    switch (tag) {
      case tags.json:
        return decodeJson(payload, "record");
      case tags.structured: {
        const { schema, data } = decodeStructuredPayload(payload);
        return new Structured(schema, data);
      }
      case tags.bytes:
        return new Uint8Array(payload);
      default:
        throw new DecodeError(`unrecognized type tag ${tagName(tag)}`);
    }
  },
};

/**
 * Codec for unstructured JSON values only
 */
export const jsonCodec: Codec<JsonValue> = {
  name: "json",

  encode(value: JsonValue): Uint8Array {
    return frame(tags.json, encodeJson(value, "record"));
  },

  decode(bytes: Uint8Array): JsonValue {
    const { tag, payload } = unframe(bytes);
    if (tag !== tags.json) {
      throw new DecodeError(`json codec cannot read type tag ${tagName(tag)}`);
    }
    return decodeJson(payload, "record");
  },
};

/**
 * Codec for raw byte strings
 */
export const bytesCodec: Codec<Uint8Array> = {
  name: "bytes",

  encode(value: Uint8Array): Uint8Array {
    if (!(value instanceof Uint8Array)) {
      throw new EncodeError("bytes codec only accepts Uint8Array values");
    }
    return frame(tags.bytes, value);
  },

  decode(bytes: Uint8Array): Uint8Array {
    const { tag, payload } = unframe(bytes);
    if (tag !== tags.bytes) {
      throw new DecodeError(`bytes codec cannot read type tag ${tagName(tag)}`);
    }
    return new Uint8Array(payload);
  },
};

function issuesOf(error: z.ZodError): SchemaValidationError["issues"] {
  return error.issues.map((issue) => ({
    pointer: issue.path.length > 0 ? `/${issue.path.join("/")}` : "",
    message: issue.message,
  }));
}

/**
 * Typed codec for schema-tagged records validated by a zod schema
 *
 * Records are stored with tag 0x02 and the schema id, so the default
 * valueCodec can still read them as `Structured` values.
 *
 * @example
 * ```typescript
 * const User = z.object({ name: z.string() });
 * const users = bucket.table("users", schemaCodec("user@1", User));
 * users.put("u1", { name: "Al" });
 * ```
 */
export function schemaCodec<T>(
  schemaId: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Codec<T> {
  if (typeof schemaId !== "string" || schemaId.length === 0) {
    throw new TypeError("schemaCodec needs a non-empty schema id");
  }

  return {
    name: `schema:${schemaId}`,

    encode(value: T): Uint8Array {
      const result = schema.safeParse(value);
      if (!result.success) {
        throw new SchemaValidationError(schemaId, issuesOf(result.error));
      }
      return frame(tags.structured, encodeStructuredPayload(schemaId, result.data));
    },

    decode(bytes: Uint8Array): T {
      const { tag, payload } = unframe(bytes);
      if (tag !== tags.structured) {
        throw new DecodeError(`expected a "${schemaId}" record, found type tag ${tagName(tag)}`);
      }
      const record = decodeStructuredPayload(payload);
      if (record.schema !== schemaId) {
        throw new DecodeError(`expected a "${schemaId}" record, found "${record.schema}"`);
      }
      const result = schema.safeParse(record.data);
      if (!result.success) {
        throw new DecodeError(`stored record does not match schema "${schemaId}"`, {
          cause: new SchemaValidationError(schemaId, issuesOf(result.error)),
        });
      }
      return result.data;
    },
  };
}

/**
 * Definition of a user codec
 */
export interface CodecDefinition<T> {
  /** Tag written with every record, in 0x10..0xff */
  tag: number;
  /** Codec name used in error messages (default: "custom:<tag>") */
  name?: string;
  serialize(value: T): Uint8Array;
  deserialize(payload: Uint8Array): T;
}

/**
 * Build a codec for any type from a serialize/deserialize pair
 *
 * Failures thrown by the pair are reported as EncodeError/DecodeError.
 */
export function defineCodec<T>(definition: CodecDefinition<T>): Codec<T> {
  const { tag } = definition;
  if (!Number.isInteger(tag) || tag < CUSTOM_TAG_MIN || tag > CUSTOM_TAG_MAX) {
    throw new RangeError(
      `Custom codec tag must be an integer in ${tagName(CUSTOM_TAG_MIN)}..${tagName(CUSTOM_TAG_MAX)}, got ${tag}`
    );
  }
  const name = definition.name ?? `custom:${tagName(tag)}`;

  return {
    name,

    encode(value: T): Uint8Array {
      let payload: Uint8Array;
      try {
        payload = definition.serialize(value);
      } catch (err) {
        if (err instanceof BucketError) throw err;
        throw new EncodeError(`${name} serializer failed`, { cause: err });
      }
      if (!(payload instanceof Uint8Array)) {
        throw new EncodeError(`${name} serializer must return a Uint8Array`);
      }
      return frame(tag, payload);
    },

    decode(bytes: Uint8Array): T {
      const decoded = unframe(bytes);
      if (decoded.tag !== tag) {
        throw new DecodeError(`${name} codec cannot read type tag ${tagName(decoded.tag)}`);
      }
      try {
        return definition.deserialize(decoded.payload);
      } catch (err) {
        if (err instanceof BucketError) throw err;
        throw new DecodeError(`${name} deserializer failed`, { cause: err });
      }
    },
  };
}
