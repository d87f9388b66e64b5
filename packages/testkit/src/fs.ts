/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openBucket } from "@bucketdb/sdk";
import type { Bucket, BucketOptions } from "@bucketdb/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "bucketdb-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "bucketdb-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a bucket in a temporary directory, cleaning up after
 * @param fn - Function to execute with the bucket
 * @param options - Optional bucket options (root will be overridden)
 * @returns Result of fn
 */
export async function withTempBucket<T>(
  fn: (bucket: Bucket, root: string) => T | Promise<T>,
  options?: Omit<BucketOptions, "root">
): Promise<T> {
  const root = await createTempRoot();
  let bucket: Bucket;
  try {
    bucket = openBucket({ ...options, root });
  } catch (err) {
    await removeDir(root);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(bucket, root);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      bucket.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(root);
    } catch (err) {
      if (!cleanupError) {
        cleanupError = err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}
