/**
 * Synchronous file I/O for table files
 *
 * Invariants:
 * - Every call blocks until the file system call completes
 * - Failures surface as IoError carrying the operation and path
 * - Temp files always reside in the same directory as their target (same filesystem for atomic rename)
 *
 * Replace pattern: write temp → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { basename, dirname, join } from "node:path";
import { IoError, errnoOf, type IoOperation } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Minimal stat result used by the store
 */
export interface FileInfo {
  isFile(): boolean;
  isDirectory(): boolean;
  size: number;
}

/**
 * The file system calls the store makes
 *
 * Tests substitute an implementation to inject failures; production code uses nodeFileSystem.
 */
export interface SyncFileSystem {
  open(path: string, flags: string): number;
  close(fd: number): void;
  read(fd: number, buffer: Uint8Array, offset: number, length: number, position: number): number;
  write(fd: number, buffer: Uint8Array, offset: number, length: number, position: number): number;
  /** Flush file data to stable storage */
  sync(fd: number): void;
  truncate(fd: number, length: number): void;
  fstat(fd: number): FileInfo;
  /** Stat a path; null when it does not exist */
  stat(path: string): FileInfo | null;
  mkdir(path: string): void;
  readdir(path: string): string[];
  rename(from: string, to: string): void;
  unlink(path: string): void;
}

/**
 * SyncFileSystem backed by node:fs
 */
export const nodeFileSystem: SyncFileSystem = {
  open: (path, flags) => fs.openSync(path, flags, 0o644),
  close: (fd) => fs.closeSync(fd),
  read: (fd, buffer, offset, length, position) => fs.readSync(fd, buffer, offset, length, position),
  write: (fd, buffer, offset, length, position) => fs.writeSync(fd, buffer, offset, length, position),
  sync(fd) {
    // Prefer datasync for performance, fall back to a full sync
    try {
      fs.fdatasyncSync(fd);
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoOf(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        fs.fsyncSync(fd);
      } else {
        throw err;
      }
    }
  },
  truncate: (fd, length) => fs.ftruncateSync(fd, length),
  fstat: (fd) => fs.fstatSync(fd),
  stat(path) {
    try {
      return fs.statSync(path);
    } catch (err) {
      if (errnoOf(err) === "ENOENT") {
        return null;
      }
      throw err;
    }
  },
  mkdir(path) {
    fs.mkdirSync(path, { recursive: true });
  },
  readdir: (path) => fs.readdirSync(path),
  rename: (from, to) => fs.renameSync(from, to),
  unlink: (path) => fs.unlinkSync(path),
};

/**
 * Run a file system call, converting failures to IoError
 */
export function io<T>(operation: IoOperation, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof IoError) {
      throw err;
    }
    throw new IoError(operation, path, { cause: err });
  }
}

/**
 * Write all of `data` at `position`, looping over short writes
 */
export function writeFully(
  fsys: SyncFileSystem,
  fd: number,
  data: Uint8Array,
  position: number
): void {
  let written = 0;
  while (written < data.length) {
    const n = fsys.write(fd, data, written, data.length - written, position + written);
    if (n <= 0) {
      throw new Error(`write made no progress after ${written} of ${data.length} bytes`);
    }
    written += n;
  }
}

/**
 * Read exactly `length` bytes at `position`
 * @returns The bytes read; shorter than `length` only when the file ends first
 */
export function readFully(
  fsys: SyncFileSystem,
  fd: number,
  length: number,
  position: number
): Buffer {
  const buffer = Buffer.allocUnsafe(length);
  let read = 0;
  while (read < length) {
    const n = fsys.read(fd, buffer, read, length - read, position + read);
    if (n === 0) {
      break;
    }
    read += n;
  }
  return read === length ? buffer : buffer.subarray(0, read);
}

/**
 * Best-effort fsync of a directory so a rename inside it is durable
 */
export function syncDirectory(fsys: SyncFileSystem, dir: string): void {
  let fd: number | null = null;
  try {
    fd = fsys.open(dir, "r");
    fsys.sync(fd);
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP, EBADF or EISDIR
    const code = errnoOf(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("dir.sync_failed", {
        message: dir,
        details: { error: err instanceof Error ? err.message : String(err) },
      });
    }
  } finally {
    if (fd !== null) {
      try {
        fsys.close(fd);
      } catch (err) {
        logger.debug("dir.close_failed", {
          message: dir,
          details: { error: err instanceof Error ? err.message : String(err) },
        });
      }
    }
  }
}

/**
 * Temp file path for replacing `filePath`
 *
 * Shape: `.<basename>.<uuid>.tmp` in the same directory.
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
}

/**
 * Whether a directory entry is a leftover temp file for a file ending in `extension`
 */
export function isTempFileName(name: string, extension: string): boolean {
  return name.startsWith(".") && name.endsWith(".tmp") && name.includes(`${extension}.`);
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @throws IoError if the path exists and is not a directory, or cannot be created
 */
export function ensureDirectory(fsys: SyncFileSystem, dirPath: string): void {
  const existing = io("stat", dirPath, () => fsys.stat(dirPath));
  if (existing) {
    if (!existing.isDirectory()) {
      throw new IoError("mkdir", dirPath, {
        cause: Object.assign(new Error(`Not a directory: ${dirPath}`), { code: "ENOTDIR" }),
      });
    }
    return;
  }

  io("mkdir", dirPath, () => fsys.mkdir(dirPath));
}
