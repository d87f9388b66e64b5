/**
 * Bucket option parsing and defaults
 */

import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { nodeFileSystem } from "./io.js";
import type { BucketOptions, ResolvedBucketOptions } from "./types.js";

export const DEFAULT_EXTENSION = ".tbl";
export const DEFAULT_MAX_KEY_BYTES = 1024;
export const DEFAULT_MAX_RECORD_BYTES = 16 * 1024 * 1024;

/**
 * Compaction thresholds used when autoCompact is enabled without overrides
 */
export const DEFAULT_AUTO_COMPACT = {
  minGarbageRatio: 0.5,
  minFileBytes: 64 * 1024,
  minEntries: 8,
} as const;

const AutoCompactSchema = z
  .object({
    minGarbageRatio: z.number().gt(0).lte(1).default(DEFAULT_AUTO_COMPACT.minGarbageRatio),
    minFileBytes: z.number().int().nonnegative().default(DEFAULT_AUTO_COMPACT.minFileBytes),
    minEntries: z.number().int().nonnegative().default(DEFAULT_AUTO_COMPACT.minEntries),
  })
  .strict();

export const BucketOptionsSchema = z
  .object({
    root: z.string().min(1, "root must be a non-empty path"),
    fsync: z.boolean().default(true),
    extension: z
      .string()
      .regex(/^\.[A-Za-z0-9]+$/, 'extension must look like ".tbl"')
      .default(DEFAULT_EXTENSION),
    maxKeyBytes: z.number().int().min(1).max(65535).default(DEFAULT_MAX_KEY_BYTES),
    maxRecordBytes: z.number().int().positive().default(DEFAULT_MAX_RECORD_BYTES),
    autoCompact: AutoCompactSchema.optional(),
  })
  .strict();

/**
 * Validate options and fill in defaults
 * @param input - Root path or full options
 * @throws ConfigError listing every invalid field
 */
export function resolveOptions(input: string | BucketOptions): ResolvedBucketOptions {
  const options: BucketOptions = typeof input === "string" ? { root: input } : input;
  const { fs, ...rest } = options;
  const parsed = BucketOptionsSchema.safeParse(rest);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  const { autoCompact, ...resolved } = parsed.data;
  return {
    ...resolved,
    root: resolve(resolved.root),
    autoCompact: autoCompact ?? null,
    fs: fs ?? nodeFileSystem,
  };
}
