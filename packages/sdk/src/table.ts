/**
 * Typed key-value access to one table
 */

import { performance } from "node:perf_hooks";
import { decodeUtf8, encodeUtf8, frame, tags, unframe } from "./codec.js";
import { DecodeError, EncodeError, NoSuchKeyError } from "./errors.js";
import { COUNTER_TAG } from "./format.js";
import { metrics, type TableMetrics, type TableOperation } from "./observability/metrics.js";
import type { LiveEntry, TableStore } from "./table-store.js";
import type { Codec, CompactionResult, ResolvedBucketOptions, ScanOptions, TableStats } from "./types.js";
import { compareKeyBytes, encodeKey } from "./validation.js";

/**
 * A named collection of key → record pairs, typed by its codec
 *
 * Every method is synchronous and blocks until the file system call completes.
 *
 * @example
 * ```typescript
 * const users = bucket.table("users");
 * users.put("u1", { name: "Al" });
 * users.get("u1"); // { name: "Al" }
 * users.delete("u1");
 * ```
 */
export class Table<T> {
  #store: TableStore;
  #codec: Codec<T>;
  #options: ResolvedBucketOptions;

  constructor(store: TableStore, codec: Codec<T>, options: ResolvedBucketOptions) {
    this.#store = store;
    this.#codec = codec;
    this.#options = options;
  }

  get name(): string {
    return this.#store.name;
  }

  /**
   * Absolute path of the backing file
   */
  get path(): string {
    return this.#store.path;
  }

  /**
   * Number of live records
   */
  get size(): number {
    this.#store.assertOpen();
    return this.#store.size;
  }

  /**
   * Store `value` under `key`, replacing any previous record
   * @throws EncodeError if the key or value cannot be encoded (nothing is written)
   * @throws IoError if the write fails (the table keeps its previous contents)
   */
  put(key: string, value: T): void {
    this.#timed("put", () => {
      this.#store.assertWritable();
      const keyBytes = this.#keyBytes(key);
      const { tag, payload } = unframe(this.#codec.encode(value));
      this.#write(key, keyBytes, tag, payload);
    });
  }

  /**
   * Store `value` under the next free numeric id ("0", "1", ...)
   *
   * Ids are not handed out again after a delete. The counter is kept in the
   * table file, so it survives reopen and compaction.
   * @returns The id the record was stored under
   */
  insert(value: T): string {
    return this.#timed("put", () => {
      this.#store.assertWritable();
      const id = this.#store.nextId();
      const key = String(id);
      const keyBytes = this.#keyBytes(key);
      const { tag, payload } = unframe(this.#codec.encode(value));
      this.#write(key, keyBytes, tag, payload, id + 1);
      return key;
    });
  }

  /**
   * Store JSON text under `key` without re-serializing it
   *
   * get() returns the parsed value and getJson() the text as given.
   * @throws EncodeError if `text` is not valid JSON or the table's codec cannot read JSON records
   */
  putJson(key: string, text: string): void {
    this.#timed("put", () => {
      this.#store.assertWritable();
      const keyBytes = this.#keyBytes(key);
      try {
        JSON.parse(text);
      } catch (err) {
        throw new EncodeError(`value for key "${key}" is not valid JSON text`, { cause: err });
      }
      const payload = encodeUtf8(text, `JSON text for key "${key}"`);
      try {
        this.#codec.decode(frame(tags.json, payload));
      } catch (err) {
        throw new EncodeError(`codec "${this.#codec.name}" cannot store JSON text`, { cause: err });
      }
      this.#write(key, keyBytes, tags.json, payload);
    });
  }

  /**
   * Read the current record for `key` as JSON text
   * @returns The stored text, or null if absent or deleted
   * @throws DecodeError if the record is not a JSON record
   */
  getJson(key: string): string | null {
    return this.#timed("get", () => {
      const entry = this.#store.locate(key);
      if (!entry) {
        return null;
      }
      if (entry.tag !== tags.json) {
        throw new DecodeError(
          `record for key "${key}" is not JSON text (type tag 0x${entry.tag.toString(16).padStart(2, "0")})`
        );
      }
      return decodeUtf8(this.#store.readPayload(entry), `record for key "${key}"`);
    });
  }

  /**
   * Read the current record for `key`
   * @returns The record, or null if absent or deleted
   * @throws DecodeError if the stored bytes are corrupt
   */
  get(key: string): T | null {
    return this.#timed("get", () => {
      const entry = this.#store.locate(key);
      return entry ? this.#read(entry) : null;
    });
  }

  /**
   * Read the current record for `key`, failing if there is none
   *
   * Unlike get(), a stored JSON `null` is returned as-is rather than confused with absence.
   * @throws NoSuchKeyError if absent or deleted
   */
  getOrThrow(key: string): T {
    return this.#timed("get", () => {
      const entry = this.#store.locate(key);
      if (!entry) {
        throw new NoSuchKeyError(this.name, key);
      }
      return this.#read(entry);
    });
  }

  has(key: string): boolean {
    return this.#store.has(key);
  }

  /**
   * Mark `key` absent; space is reclaimed by compact()
   * @returns true if a live record was deleted
   */
  delete(key: string): boolean {
    return this.#timed("delete", () => {
      this.#store.assertWritable();
      return this.#store.remove(key, this.#keyBytes(key));
    });
  }

  /**
   * Rewrite the backing file with only live records
   */
  compact(): CompactionResult {
    return this.#timed("compact", () => this.#store.compact());
  }

  /**
   * Lazy, restartable iteration over live records
   *
   * Each `for...of` starts a fresh pass. Keys deleted during a pass are skipped;
   * keys overwritten during a pass yield their current record.
   */
  scan(options: ScanOptions = {}): Iterable<[string, T]> {
    this.#store.assertOpen();
    const keys = (): string[] => this.#snapshotKeys(options);

    return {
      [Symbol.iterator]: (): Iterator<[string, T]> => this.#iterate(keys()),
    };
  }

  /**
   * Live keys, in storage order unless `order: "key"` is given
   */
  keys(options: ScanOptions = {}): string[] {
    this.#store.assertOpen();
    return this.#snapshotKeys(options);
  }

  /**
   * All live records as an array (eager form of scan)
   */
  entries(options: ScanOptions = {}): Array<[string, T]> {
    return [...this.scan(options)];
  }

  stats(): TableStats {
    this.#store.assertOpen();
    return this.#store.stats();
  }

  /**
   * Operation counts and latency samples for this table
   */
  metrics(): TableMetrics | undefined {
    return metrics.getMetrics(this.path);
  }

  *#iterate(keys: string[]): Generator<[string, T]> {
    const started = performance.now();
    for (const key of keys) {
      const entry = this.#store.locate(key);
      if (!entry) {
        continue;
      }
      yield [key, this.#read(entry)];
    }
    metrics.recordOperation(this.path, "scan", performance.now() - started);
  }

  #write(key: string, keyBytes: Uint8Array, tag: number, payload: Uint8Array, nextId?: number): void {
    if (tag === tags.tombstone) {
      throw new EncodeError(`codec "${this.#codec.name}" produced the reserved tombstone tag`);
    }
    if (tag === COUNTER_TAG) {
      throw new EncodeError(`codec "${this.#codec.name}" produced the reserved id counter tag`);
    }
    if (payload.length > this.#options.maxRecordBytes) {
      throw new EncodeError(
        `record for key "${key}" is ${payload.length} bytes, limit is ${this.#options.maxRecordBytes}`
      );
    }
    this.#store.append(key, keyBytes, tag, payload, nextId);
  }

  /**
   * Keys already in the table stay writable after maxKeyBytes is lowered
   */
  #keyBytes(key: string): Uint8Array {
    const limit = this.#store.has(key) ? Number.POSITIVE_INFINITY : this.#options.maxKeyBytes;
    return encodeKey(key, limit);
  }

  #read(entry: LiveEntry): T {
    return this.#codec.decode(frame(entry.tag, this.#store.readPayload(entry)));
  }

  #snapshotKeys(options: ScanOptions): string[] {
    const { prefix, order = "storage" } = options;
    let keys = this.#store.liveEntries().map((entry) => entry.key);

    if (prefix) {
      keys = keys.filter((key) => key.startsWith(prefix));
    }

    if (order === "key") {
      const encoder = new TextEncoder();
      keys = keys
        .map((key) => ({ key, bytes: encoder.encode(key) }))
        .sort((a, b) => compareKeyBytes(a.bytes, b.bytes))
        .map(({ key }) => key);
    }

    return keys;
  }

  #timed<R>(op: TableOperation, fn: () => R): R {
    const started = performance.now();
    try {
      const result = fn();
      metrics.recordOperation(this.path, op, performance.now() - started);
      return result;
    } catch (err) {
      metrics.recordError(this.path);
      throw err;
    }
  }
}
