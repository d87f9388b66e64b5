/**
 * Append-only table file with an in-memory key index
 *
 * Invariants:
 * - The file is always a sequence of complete entries; a failed append is truncated away
 * - The index maps each live key to the location of its newest entry
 * - garbageBytes counts superseded entries and tombstones, which compaction drops
 * - The newest id counter entry holds the next id insert() may use
 * - Compaction writes a temp file and renames it over the original only after fsync
 */

import { tags, decodeUtf8 } from "./codec.js";
import { ClosedError, DecodeError, IoError } from "./errors.js";
import {
  COUNTER_TAG,
  decodeCounter,
  encodeCounter,
  encodeEntry,
  encodeTombstone,
  parseEntry,
  type EntryLocation,
} from "./format.js";
import {
  io,
  readFully,
  syncDirectory,
  tempPathFor,
  writeFully,
  type SyncFileSystem,
} from "./io.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { CompactionResult, ResolvedBucketOptions, TableStats } from "./types.js";

/**
 * Index entry for a live key
 */
export interface LiveEntry extends EntryLocation {
  key: string;
}

/**
 * An entry written by one append, in file order
 */
type PendingEntry =
  | { kind: "record"; key: string; tag: number; length: number; payloadLength: number }
  | { kind: "counter"; nextId: number; length: number; payloadLength: number };

interface CounterEntry {
  location: EntryLocation;
  nextId: number;
}

/**
 * Raw storage for one table: file descriptor, index and space accounting
 */
export class TableStore {
  readonly name: string;
  readonly path: string;
  #options: ResolvedBucketOptions;
  #fs: SyncFileSystem;
  #fd: number | null = null;
  #index = new Map<string, LiveEntry>();
  #size = 0;
  #entries = 0;
  #garbage = 0;
  #closed = false;
  #broken: IoError | null = null;
  #counter: CounterEntry | null = null;

  /**
   * Open the store for `path`, loading the file if it exists
   * @throws IoError if the file cannot be opened or read
   * @throws DecodeError if an entry length is malformed
   */
  constructor(name: string, path: string, options: ResolvedBucketOptions) {
    this.name = name;
    this.path = path;
    this.#options = options;
    this.#fs = options.fs;

    const existing = io("stat", path, () => this.#fs.stat(path));
    if (existing) {
      this.#load();
    }
  }

  /**
   * Whether the backing file has been created
   */
  get exists(): boolean {
    return this.#fd !== null;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Number of live keys
   */
  get size(): number {
    return this.#index.size;
  }

  stats(): TableStats {
    return {
      liveRecords: this.#index.size,
      totalEntries: this.#entries,
      fileBytes: this.#size,
      garbageBytes: this.#garbage,
    };
  }

  /**
   * Create the backing file if it does not exist yet
   */
  create(): void {
    this.assertOpen();
    this.#ensureFile();
  }

  has(key: string): boolean {
    this.assertOpen();
    return this.#index.has(key);
  }

  /**
   * Current location of a live key
   */
  locate(key: string): LiveEntry | undefined {
    this.assertOpen();
    return this.#index.get(key);
  }

  /**
   * Live entries ordered by their position in the file
   */
  liveEntries(): LiveEntry[] {
    this.assertOpen();
    return [...this.#index.values()].sort((a, b) => a.offset - b.offset);
  }

  /**
   * Smallest id at or above the stored counter that is not a live key
   */
  nextId(): number {
    this.assertOpen();
    let id = this.#counter?.nextId ?? 0;
    while (this.#index.has(String(id))) {
      id++;
    }
    return id;
  }

  /**
   * Read the payload of a live entry from disk
   * @throws DecodeError if the file is shorter than the index expects
   */
  readPayload(entry: LiveEntry): Uint8Array {
    this.assertOpen();
    const fd = this.#fd;
    if (fd === null) {
      if (this.#broken) {
        throw this.#broken;
      }
      throw new DecodeError(`table "${this.name}" has no file for key "${entry.key}"`);
    }

    const payload = io("read", this.path, () =>
      readFully(this.#fs, fd, entry.payloadLength, entry.payloadOffset)
    );
    if (payload.length !== entry.payloadLength) {
      throw new DecodeError(
        `record for key "${entry.key}" is truncated: expected ${entry.payloadLength} bytes, read ${payload.length}`
      );
    }
    return payload;
  }

  /**
   * Append a record entry for `key`, followed by a counter entry when `nextId` is given
   *
   * Both entries go out in one write, so a rollback removes them together.
   * @throws IoError if the write fails (the file is rolled back to its previous length)
   */
  append(key: string, keyBytes: Uint8Array, tag: number, payload: Uint8Array, nextId?: number): void {
    const record = encodeEntry(tag, keyBytes, payload);
    const pending: PendingEntry[] = [
      { kind: "record", key, tag, length: record.length, payloadLength: payload.length },
    ];
    let bytes = record;

    if (nextId !== undefined) {
      const counter = encodeCounter(nextId);
      bytes = new Uint8Array(record.length + counter.length);
      bytes.set(record, 0);
      bytes.set(counter, record.length);
      pending.push({
        kind: "counter",
        nextId,
        length: counter.length,
        payloadLength: String(nextId).length,
      });
    }

    this.#appendEntries(bytes, pending);
    this.#maybeCompact();
  }

  /**
   * Append a tombstone for `key` if it is live
   * @returns true if the key was live
   */
  remove(key: string, keyBytes: Uint8Array): boolean {
    this.assertWritable();
    if (!this.#index.has(key)) {
      return false;
    }
    const tombstone = encodeTombstone(keyBytes);
    this.#appendEntries(tombstone, [
      { kind: "record", key, tag: tags.tombstone, length: tombstone.length, payloadLength: 0 },
    ]);
    this.#maybeCompact();
    return true;
  }

  /**
   * Rewrite the file keeping only live entries
   *
   * On failure before the rename the original file and index are untouched.
   */
  compact(): CompactionResult {
    this.assertWritable();
    const fd = this.#fd;
    const bytesBefore = this.#size;

    if (fd === null || this.#garbage === 0) {
      return { bytesBefore, bytesAfter: bytesBefore, liveRecords: this.#index.size, reclaimedBytes: 0 };
    }

    const live = this.liveEntries();
    const next = new Map<string, LiveEntry>();
    const counter = this.#counter;
    let nextCounter: CounterEntry | null = null;
    const tmp = tempPathFor(this.path);
    let tmpFd: number | null = null;
    let position = 0;

    try {
      const out = io("open", tmp, () => this.#fs.open(tmp, "wx+"));
      tmpFd = out;

      for (const entry of live) {
        const bytes = io("read", this.path, () => readFully(this.#fs, fd, entry.length, entry.offset));
        if (bytes.length !== entry.length) {
          throw new DecodeError(`entry for key "${entry.key}" is truncated at offset ${entry.offset}`);
        }
        const at = position;
        io("write", tmp, () => writeFully(this.#fs, out, bytes, at));
        next.set(entry.key, {
          ...entry,
          offset: at,
          payloadOffset: at + (entry.payloadOffset - entry.offset),
        });
        position += entry.length;
      }

      if (counter) {
        const { location } = counter;
        const bytes = io("read", this.path, () =>
          readFully(this.#fs, fd, location.length, location.offset)
        );
        if (bytes.length !== location.length) {
          throw new DecodeError(`id counter is truncated at offset ${location.offset}`);
        }
        const at = position;
        io("write", tmp, () => writeFully(this.#fs, out, bytes, at));
        nextCounter = {
          nextId: counter.nextId,
          location: { ...location, offset: at, payloadOffset: at + (location.payloadOffset - location.offset) },
        };
        position += location.length;
      }

      io("sync", tmp, () => this.#fs.sync(out));
      tmpFd = null;
      io("close", tmp, () => this.#fs.close(out));
      io("rename", this.path, () => this.#fs.rename(tmp, this.path));
    } catch (err) {
      this.#discardTemp(tmp, tmpFd);
      throw err;
    }

    // The compacted file is in place; swap descriptors and index
    this.#fd = null;
    this.#closeQuietly(fd, "table.close_failed");
    try {
      this.#fd = io("open", this.path, () => this.#fs.open(this.path, "r+"));
    } catch (err) {
      const failure = err instanceof IoError ? err : new IoError("open", this.path, { cause: err });
      this.#broken = failure;
      throw failure;
    }
    syncDirectory(this.#fs, this.#options.root);

    this.#index = next;
    this.#counter = nextCounter;
    this.#size = position;
    this.#entries = next.size + (nextCounter ? 1 : 0);
    this.#garbage = 0;

    const result: CompactionResult = {
      bytesBefore,
      bytesAfter: position,
      liveRecords: next.size,
      reclaimedBytes: bytesBefore - position,
    };
    metrics.recordCompaction(this.path, result.reclaimedBytes);
    logger.debug("table.compacted", { table: this.name, details: { ...result } });
    return result;
  }

  /**
   * Release the file descriptor; further use throws ClosedError
   */
  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;

    const fd = this.#fd;
    this.#fd = null;
    this.#index.clear();
    if (fd !== null) {
      io("close", this.path, () => this.#fs.close(fd));
    }
  }

  /**
   * Close the store and delete its file
   */
  drop(): void {
    this.close();
    const existing = io("stat", this.path, () => this.#fs.stat(this.path));
    if (existing) {
      io("unlink", this.path, () => this.#fs.unlink(this.path));
      syncDirectory(this.#fs, this.#options.root);
    }
  }

  assertOpen(): void {
    if (this.#closed) {
      throw new ClosedError(`table "${this.name}"`);
    }
  }

  assertWritable(): void {
    this.assertOpen();
    if (this.#broken) {
      throw new IoError("write", this.path, { cause: this.#broken });
    }
  }

  #load(): void {
    const fd = io("open", this.path, () => this.#fs.open(this.path, "r+"));
    try {
      const size = io("stat", this.path, () => this.#fs.fstat(fd).size);
      const buffer = io("read", this.path, () => readFully(this.#fs, fd, size, 0));

      let offset = 0;
      while (offset < buffer.length) {
        const entry = parseEntry(buffer, offset);
        if (!entry) {
          break;
        }
        if (entry.tag === COUNTER_TAG) {
          const payload = buffer.subarray(entry.payloadOffset, entry.payloadOffset + entry.payloadLength);
          this.#applyCounter(entry, decodeCounter(payload, entry.offset));
        } else {
          this.#apply(entry, decodeUtf8(entry.key, `key at offset ${offset}`));
        }
        offset += entry.length;
      }

      if (offset < buffer.length) {
        // An append was interrupted; drop the incomplete tail
        io("truncate", this.path, () => this.#fs.truncate(fd, offset));
        if (this.#options.fsync) {
          io("sync", this.path, () => this.#fs.sync(fd));
        }
        logger.warn("table.recovered", {
          table: this.name,
          message: "truncated incomplete entry",
          details: { offset, droppedBytes: buffer.length - offset },
        });
      }

      this.#size = offset;
      this.#fd = fd;
    } catch (err) {
      this.#closeQuietly(fd, "table.close_failed");
      throw err;
    }

    logger.debug("table.opened", {
      table: this.name,
      details: { records: this.#index.size, bytes: this.#size },
    });
  }

  #apply(entry: EntryLocation, key: string): void {
    this.#entries++;

    const previous = this.#index.get(key);
    if (previous) {
      this.#garbage += previous.length;
    }

    if (entry.tag === tags.tombstone) {
      this.#index.delete(key);
      this.#garbage += entry.length;
      return;
    }

    this.#index.set(key, {
      key,
      tag: entry.tag,
      offset: entry.offset,
      length: entry.length,
      payloadOffset: entry.payloadOffset,
      payloadLength: entry.payloadLength,
    });
  }

  #applyCounter(entry: EntryLocation, nextId: number): void {
    this.#entries++;
    if (this.#counter) {
      this.#garbage += this.#counter.location.length;
    }
    this.#counter = { location: entry, nextId };
  }

  #appendEntries(bytes: Uint8Array, pending: PendingEntry[]): void {
    this.assertWritable();
    const fd = this.#ensureFile();
    const start = this.#size;

    let operation: "write" | "sync" = "write";
    try {
      writeFully(this.#fs, fd, bytes, start);
      if (this.#options.fsync) {
        operation = "sync";
        this.#fs.sync(fd);
      }
    } catch (err) {
      this.#rollback(fd, start);
      throw new IoError(operation, this.path, { cause: err });
    }

    this.#size = start + bytes.length;
    let offset = start;
    for (const entry of pending) {
      const location: EntryLocation = {
        tag: entry.kind === "counter" ? COUNTER_TAG : entry.tag,
        offset,
        length: entry.length,
        payloadOffset: offset + entry.length - entry.payloadLength,
        payloadLength: entry.payloadLength,
      };
      if (entry.kind === "counter") {
        this.#applyCounter(location, entry.nextId);
      } else {
        this.#apply(location, entry.key);
      }
      offset += entry.length;
    }
  }

  #rollback(fd: number, length: number): void {
    try {
      this.#fs.truncate(fd, length);
    } catch (err) {
      // The file may now end with a partial entry; refuse writes until reopened
      this.#broken = new IoError("truncate", this.path, { cause: err });
      logger.error("table.rollback_failed", {
        table: this.name,
        message: "table is read-only until reopened",
        details: { length, error: err instanceof Error ? err.message : String(err) },
      });
    }
  }

  #ensureFile(): number {
    if (this.#fd !== null) {
      return this.#fd;
    }
    const fd = io("open", this.path, () => this.#fs.open(this.path, "wx+"));
    syncDirectory(this.#fs, this.#options.root);
    this.#fd = fd;
    this.#size = 0;
    return fd;
  }

  #maybeCompact(): void {
    const policy = this.#options.autoCompact;
    if (!policy || this.#garbage === 0 || this.#size === 0) {
      return;
    }
    if (
      this.#size < policy.minFileBytes ||
      this.#entries < policy.minEntries ||
      this.#garbage / this.#size < policy.minGarbageRatio
    ) {
      return;
    }

    try {
      this.compact();
    } catch (err) {
      // The write itself succeeded; the next write retries compaction
      metrics.recordError(this.path);
      logger.error("table.compact_failed", {
        table: this.name,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  #discardTemp(tmp: string, fd: number | null): void {
    if (fd !== null) {
      this.#closeQuietly(fd, "table.temp_close_failed");
    }
    try {
      this.#fs.unlink(tmp);
    } catch (err) {
      logger.debug("table.temp_unlink_failed", {
        table: this.name,
        message: tmp,
        details: { error: err instanceof Error ? err.message : String(err) },
      });
    }
  }

  #closeQuietly(fd: number, event: string): void {
    try {
      this.#fs.close(fd);
    } catch (err) {
      logger.warn(event, {
        table: this.name,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
