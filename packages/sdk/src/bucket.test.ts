import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempRoot, removeDir, withTempBucket, FaultyFileSystem } from "@bucketdb/testkit";
import { Bucket, openBucket, withBucket } from "./bucket.js";
import { jsonCodec } from "./codec.js";
import {
  ClosedError,
  ConfigError,
  InvalidNameError,
  IoError,
  NoSuchTableError,
} from "./errors.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("Bucket", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempRoot();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe("openBucket", () => {
    it("should create a missing root directory", async () => {
      const dir = join(root, "nested", "data");
      const bucket = openBucket(dir);
      try {
        expect(bucket.root).toBe(dir);
        expect((await stat(dir)).isDirectory()).toBe(true);
      } finally {
        bucket.close();
      }
    });

    it("should fail when the root is a file", async () => {
      const file = join(root, "file");
      await writeFile(file, "x");

      const err = thrown(() => openBucket(file));
      expect(err).toBeInstanceOf(IoError);
      expect(err).toMatchObject({ operation: "mkdir", errno: "ENOTDIR", path: file });
    });

    it("should reject invalid options", () => {
      expect(() => openBucket({ root, maxKeyBytes: -1 })).toThrow(ConfigError);
    });

    it("should remove temp files left by an interrupted compaction", async () => {
      await writeFile(join(root, ".users.tbl.0f3c.tmp"), "partial");
      await writeFile(join(root, ".keep"), "");
      await writeFile(join(root, "users.tbl"), new Uint8Array(0));

      const bucket = openBucket(root);
      bucket.close();

      expect((await readdir(root)).sort()).toEqual([".keep", "users.tbl"]);
    });
  });

  describe("durability", () => {
    it("should keep records across close and reopen", () => {
      const first = openBucket(root);
      first.table("users").put("u1", { name: "Al" });
      first.close();

      const second = openBucket(root);
      try {
        expect(second.table("users").get("u1")).toEqual({ name: "Al" });
      } finally {
        second.close();
      }
    });

    it("should keep records with fsync disabled", () => {
      withBucket({ root, fsync: false }, (bucket) => {
        bucket.table("t").put("k", [1, 2, 3]);
      });
      withBucket(root, (bucket) => {
        expect(bucket.table("t").get("k")).toEqual([1, 2, 3]);
      });
    });

    it("should use the configured extension", async () => {
      withBucket({ root, extension: ".db" }, (bucket) => {
        bucket.table("t").put("k", 1);
        expect(bucket.listTables()).toEqual(["t"]);
      });
      expect(await readdir(root)).toEqual(["t.db"]);
    });
  });

  describe("tables", () => {
    let bucket: Bucket;

    beforeEach(() => {
      bucket = openBucket(root);
    });

    afterEach(() => {
      if (!bucket.closed) {
        bucket.close();
      }
    });

    it("should reject invalid table names", () => {
      expect(() => bucket.table("../escape")).toThrow(InvalidNameError);
      expect(() => bucket.table("")).toThrow(InvalidNameError);
      expect(() => bucket.hasTable("a/b")).toThrow(InvalidNameError);
    });

    it("should create an empty table file eagerly with createTable", async () => {
      const t = bucket.createTable("events", jsonCodec);
      expect(t.size).toBe(0);
      expect(bucket.hasTable("events")).toBe(true);
      expect((await stat(join(root, "events.tbl"))).size).toBe(0);
    });

    it("should list tables with backing files, sorted", async () => {
      await writeFile(join(root, "b.tbl"), new Uint8Array(0));
      await writeFile(join(root, "a.tbl"), new Uint8Array(0));
      await writeFile(join(root, "notes.txt"), "");
      await writeFile(join(root, "bad name.tbl"), "");
      await mkdir(join(root, "dir.tbl"));

      bucket.createTable("c");
      bucket.table("never-written");

      expect(bucket.listTables()).toEqual(["a", "b", "c"]);
      expect(bucket.hasTable("dir")).toBe(false);
      expect(bucket.hasTable("never-written")).toBe(false);
    });

    it("should drop a table and its file", async () => {
      const t = bucket.table("old");
      t.put("k", 1);

      bucket.dropTable("old");

      expect(await readdir(root)).toEqual([]);
      expect(bucket.hasTable("old")).toBe(false);
      expect(() => t.get("k")).toThrow(ClosedError);
      expect(bucket.table("old").get("k")).toBeNull();
    });

    it("should forget the metrics of a dropped table", () => {
      const t = bucket.table("old");
      t.put("k", 1);
      expect(t.metrics()?.counts.put).toBe(1);

      bucket.dropTable("old");

      expect(bucket.table("old").metrics()).toBeUndefined();
    });

    it("should drop a table that was never opened", async () => {
      await writeFile(join(root, "cold.tbl"), new Uint8Array(0));
      bucket.dropTable("cold");
      expect(bucket.listTables()).toEqual([]);
    });

    it("should throw NoSuchTableError when dropping a missing table", () => {
      const err = thrown(() => bucket.dropTable("ghost"));
      expect(err).toBeInstanceOf(NoSuchTableError);
      expect(err).toMatchObject({ table: "ghost", message: 'Table "ghost" does not exist' });
    });

    it("should close every table on close", () => {
      const a = bucket.table("a");
      const b = bucket.table("b");
      a.put("k", 1);

      bucket.close();

      expect(() => a.get("k")).toThrow(ClosedError);
      expect(() => b.get("k")).toThrow(ClosedError);
    });

    it("should reject use after close and ignore a second close", () => {
      bucket.close();
      expect(() => bucket.close()).not.toThrow();
      expect(() => bucket.table("t")).toThrow("Cannot use closed bucket");
      expect(() => bucket.createTable("t")).toThrow(ClosedError);
      expect(() => bucket.hasTable("t")).toThrow(ClosedError);
      expect(() => bucket.listTables()).toThrow(ClosedError);
      expect(() => bucket.dropTable("t")).toThrow(ClosedError);
    });
  });

  describe("close failures", () => {
    it("should close remaining tables and rethrow the first failure", () => {
      const faulty = new FaultyFileSystem();
      const bucket = openBucket({ root, fs: faulty.fs });
      const a = bucket.table("a");
      const b = bucket.table("b");
      a.put("k", 1);
      b.put("k", 2);

      faulty.failNext({ operation: "close" });
      expect(() => bucket.close()).toThrow(IoError);

      expect(bucket.closed).toBe(true);
      expect(() => b.get("k")).toThrow(ClosedError);
      expect(faulty.pending).toEqual([]);
    });
  });

  describe("withBucket", () => {
    it("should return the callback result and close the bucket", () => {
      const seen: Bucket[] = [];
      const result = withBucket(root, (bucket) => {
        seen.push(bucket);
        return "done";
      });
      expect(result).toBe("done");
      expect(seen[0]?.closed).toBe(true);
    });

    it("should close the bucket when the callback throws", () => {
      const seen: Bucket[] = [];
      expect(() =>
        withBucket(root, (bucket) => {
          seen.push(bucket);
          throw new Error("boom");
        })
      ).toThrow("boom");
      expect(seen[0]?.closed).toBe(true);
    });
  });
});

describe("withTempBucket", () => {
  it("should provide an open bucket and remove its root afterwards", async () => {
    let dir = "";
    await withTempBucket((bucket, tempRoot) => {
      dir = tempRoot;
      bucket.table("t").put("k", 1);
      expect(bucket.listTables()).toEqual(["t"]);
    });
    await expect(stat(dir)).rejects.toThrow();
  });
});
