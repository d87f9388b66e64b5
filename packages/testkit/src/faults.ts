/**
 * Fault injection for the synchronous file system port
 */

import { nodeFileSystem } from "@bucketdb/sdk";
import type { SyncFileSystem } from "@bucketdb/sdk";

export type FaultOperation = "open" | "write" | "sync" | "truncate" | "rename" | "close";

/**
 * A failure to inject on the next matching call
 */
export interface Fault {
  operation: FaultOperation;
  /** errno code of the thrown error (default: "EIO") */
  code?: string;
  /** For writes: bytes actually written before the failure (default: 0) */
  partialBytes?: number;
  /** Only match calls whose path contains this string (open and rename only) */
  pathIncludes?: string;
}

function errnoError(code: string, operation: string): Error {
  return Object.assign(new Error(`${code}: injected ${operation} failure`), { code });
}

/**
 * A file system that fails on demand
 *
 * @example
 * ```typescript
 * const faulty = new FaultyFileSystem();
 * const bucket = openBucket({ root, fs: faulty.fs });
 * faulty.failNext({ operation: "write", code: "ENOSPC", partialBytes: 3 });
 * ```
 */
export class FaultyFileSystem {
  readonly fs: SyncFileSystem;
  #pending: Fault[] = [];
  #triggered: Fault[] = [];

  constructor(base: SyncFileSystem = nodeFileSystem) {
    this.fs = {
      ...base,
      open: (path, flags) => {
        this.#check("open", path);
        return base.open(path, flags);
      },
      close: (fd) => {
        this.#check("close");
        base.close(fd);
      },
      write: (fd, buffer, offset, length, position) => {
        const fault = this.#take("write");
        if (fault) {
          const partial = Math.min(fault.partialBytes ?? 0, length);
          if (partial > 0) {
            base.write(fd, buffer, offset, partial, position);
          }
          throw errnoError(fault.code ?? "EIO", "write");
        }
        return base.write(fd, buffer, offset, length, position);
      },
      sync: (fd) => {
        this.#check("sync");
        base.sync(fd);
      },
      truncate: (fd, length) => {
        this.#check("truncate");
        base.truncate(fd, length);
      },
      rename: (from, to) => {
        this.#check("rename", to);
        base.rename(from, to);
      },
    };
  }

  /**
   * Queue a failure for the next call matching `fault`
   */
  failNext(fault: Fault): void {
    this.#pending.push(fault);
  }

  /**
   * Faults that have fired so far
   */
  get triggered(): readonly Fault[] {
    return this.#triggered;
  }

  /**
   * Faults queued but not yet fired
   */
  get pending(): readonly Fault[] {
    return this.#pending;
  }

  #take(operation: FaultOperation, path?: string): Fault | undefined {
    const index = this.#pending.findIndex(
      (fault) =>
        fault.operation === operation &&
        (fault.pathIncludes === undefined || (path?.includes(fault.pathIncludes) ?? false))
    );
    if (index === -1) {
      return undefined;
    }
    const [fault] = this.#pending.splice(index, 1);
    if (fault) {
      this.#triggered.push(fault);
    }
    return fault;
  }

  #check(operation: FaultOperation, path?: string): void {
    const fault = this.#take(operation, path);
    if (fault) {
      throw errnoError(fault.code ?? "EIO", operation);
    }
  }
}
