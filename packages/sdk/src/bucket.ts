/**
 * Bucket: the public entry point owning a root directory and its tables
 */

import { join } from "node:path";
import { valueCodec } from "./codec.js";
import { resolveOptions } from "./config.js";
import { ClosedError, InvalidNameError, NoSuchTableError } from "./errors.js";
import { ensureDirectory, io, isTempFileName, syncDirectory } from "./io.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { Table } from "./table.js";
import { TableStore } from "./table-store.js";
import type { BucketOptions, Codec, ResolvedBucketOptions, TableValue } from "./types.js";
import { validateTableName } from "./validation.js";

/**
 * Handle on a directory of tables
 *
 * A bucket exclusively owns the file descriptors of the tables it opens and
 * releases them in close(). It keeps no data cache of its own.
 *
 * @example
 * ```typescript
 * const bucket = openBucket("./data");
 * const users = bucket.table("users");
 * users.put("u1", { name: "Al" });
 * bucket.close();
 * ```
 */
export class Bucket {
  #options: ResolvedBucketOptions;
  #stores = new Map<string, TableStore>();
  #closed = false;

  constructor(options: ResolvedBucketOptions) {
    this.#options = options;
    ensureDirectory(options.fs, options.root);
    this.#sweepTempFiles();
    logger.debug("bucket.opened", { message: options.root });
  }

  /**
   * Absolute path of the root directory
   */
  get root(): string {
    return this.#options.root;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Get a table, typed by `codec` (default: valueCodec)
   *
   * The backing file is created on the first write. Every view of the same
   * name shares one file descriptor and index.
   */
  table(name: string): Table<TableValue>;
  table<T>(name: string, codec: Codec<T>): Table<T>;
  table<T>(name: string, codec?: Codec<T>): Table<T> | Table<TableValue> {
    const store = this.#store(name);
    return codec
      ? new Table(store, codec, this.#options)
      : new Table(store, valueCodec, this.#options);
  }

  /**
   * Get a table and create its backing file now
   */
  createTable(name: string): Table<TableValue>;
  createTable<T>(name: string, codec: Codec<T>): Table<T>;
  createTable<T>(name: string, codec?: Codec<T>): Table<T> | Table<TableValue> {
    const store = this.#store(name);
    store.create();
    return codec
      ? new Table(store, codec, this.#options)
      : new Table(store, valueCodec, this.#options);
  }

  /**
   * Whether a table file exists for `name`
   */
  hasTable(name: string): boolean {
    this.#assertOpen();
    validateTableName(name);
    if (this.#stores.get(name)?.exists) {
      return true;
    }
    const path = this.#pathFor(name);
    const info = io("stat", path, () => this.#options.fs.stat(path));
    return info?.isFile() ?? false;
  }

  /**
   * Names of all tables with a backing file, sorted
   */
  listTables(): string[] {
    this.#assertOpen();
    const { extension } = this.#options;
    const names = new Set<string>();

    for (const entry of this.#readRoot()) {
      if (entry.startsWith(".") || !entry.endsWith(extension)) {
        continue;
      }
      const name = entry.slice(0, -extension.length);
      try {
        validateTableName(name);
      } catch (err) {
        if (err instanceof InvalidNameError) continue;
        throw err;
      }
      const path = this.#pathFor(name);
      if (io("stat", path, () => this.#options.fs.stat(path))?.isFile()) {
        names.add(name);
      }
    }

    for (const [name, store] of this.#stores) {
      if (store.exists) {
        names.add(name);
      }
    }

    return [...names].sort();
  }

  /**
   * Close a table and delete its file
   * @throws NoSuchTableError if the table has no backing file
   */
  dropTable(name: string): void {
    this.#assertOpen();
    validateTableName(name);
    const path = this.#pathFor(name);
    const store = this.#stores.get(name);

    const info = io("stat", path, () => this.#options.fs.stat(path));
    if (!info?.isFile()) {
      store?.close();
      this.#stores.delete(name);
      throw new NoSuchTableError(name);
    }

    this.#stores.delete(name);
    if (store) {
      store.drop();
    } else {
      io("unlink", path, () => this.#options.fs.unlink(path));
      syncDirectory(this.#options.fs, this.#options.root);
    }
    metrics.reset(path);
    logger.debug("table.dropped", { table: name });
  }

  /**
   * Close every open table; later calls on the bucket or its tables throw ClosedError
   *
   * All tables are closed even if one fails; the first failure is rethrown.
   */
  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;

    let firstError: unknown = null;
    for (const store of this.#stores.values()) {
      try {
        store.close();
      } catch (err) {
        firstError ??= err;
      }
    }
    this.#stores.clear();
    logger.debug("bucket.closed", { message: this.#options.root });

    if (firstError !== null) {
      throw firstError;
    }
  }

  #store(name: string): TableStore {
    this.#assertOpen();
    validateTableName(name);

    let store = this.#stores.get(name);
    if (!store) {
      store = new TableStore(name, this.#pathFor(name), this.#options);
      this.#stores.set(name, store);
    }
    return store;
  }

  #pathFor(name: string): string {
    return join(this.#options.root, `${name}${this.#options.extension}`);
  }

  #readRoot(): string[] {
    const { fs, root } = this.#options;
    return io("readdir", root, () => fs.readdir(root));
  }

  /**
   * Remove temp files left behind by a compaction that was interrupted
   */
  #sweepTempFiles(): void {
    const { fs, extension } = this.#options;
    for (const entry of this.#readRoot()) {
      if (!isTempFileName(entry, extension)) {
        continue;
      }
      const path = join(this.#options.root, entry);
      try {
        fs.unlink(path);
        logger.debug("bucket.swept", { message: path });
      } catch (err) {
        logger.warn("bucket.sweep_failed", {
          message: path,
          details: { error: err instanceof Error ? err.message : String(err) },
        });
      }
    }
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new ClosedError("bucket");
    }
  }
}

/**
 * Open (or create) a bucket rooted at a directory
 * @param input - Root path, or options including the root
 * @throws ConfigError if options are invalid
 * @throws IoError if the root exists and is not a directory, or cannot be created
 */
export function openBucket(input: string | BucketOptions): Bucket {
  return new Bucket(resolveOptions(input));
}

/**
 * Run `fn` with an open bucket and close it on every exit path
 */
export function withBucket<R>(input: string | BucketOptions, fn: (bucket: Bucket) => R): R {
  const bucket = openBucket(input);
  let failed = false;
  try {
    return fn(bucket);
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    try {
      bucket.close();
    } catch (closeErr) {
      // Do not mask the error thrown by fn
      if (!failed) {
        // eslint-disable-next-line no-unsafe-finally
        throw closeErr;
      }
      logger.error("bucket.close_failed", {
        message: closeErr instanceof Error ? closeErr.message : String(closeErr),
      });
    }
  }
}
