/**
 * Performance checks for table writes, reads and compaction
 * Run with: VITEST_PERF=1 npm test
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTempRoot, removeDir, clock } from "@bucketdb/testkit";
import { openBucket, type Bucket } from "../src/bucket.js";

describe.runIf(Boolean(process.env.VITEST_PERF))("Table Performance Benchmarks", () => {
  let root: string;
  let bucket: Bucket;

  beforeEach(async () => {
    root = await createTempRoot("bucketdb-bench-");
    bucket = openBucket({ root, fsync: false });
  });

  afterEach(async () => {
    bucket.close();
    await removeDir(root);
  });

  it("10k puts without fsync - p95 < 1ms", { timeout: 60000 }, () => {
    const tasks = bucket.table("tasks");
    const { meanMs, p95Ms } = clock.sample((i) => {
      tasks.put(`task:${i}`, { id: i, status: i % 3 === 0 ? "open" : "closed", title: `Task ${i}` });
    }, 10_000);

    console.log(`put: mean ${meanMs.toFixed(4)}ms, p95 ${p95Ms.toFixed(4)}ms`);
    expect(tasks.size).toBe(10_000);
    expect(p95Ms).toBeLessThan(1);
  });

  it("10k random gets after reopen - p95 < 1ms", { timeout: 60000 }, () => {
    const tasks = bucket.table("tasks");
    for (let i = 0; i < 10_000; i++) {
      tasks.put(`task:${i}`, { id: i });
    }
    bucket.close();

    const [reopened, openMs] = clock.measure(() => openBucket({ root, fsync: false }));
    bucket = reopened;
    const cold = bucket.table("tasks");
    console.log(`reopen: ${openMs.toFixed(2)}ms`);

    const { p95Ms } = clock.sample((i) => {
      const key = `task:${(i * 7919) % 10_000}`;
      expect(cold.get(key)).not.toBeNull();
    }, 10_000);

    console.log(`get: p95 ${p95Ms.toFixed(4)}ms`);
    expect(p95Ms).toBeLessThan(1);
  });

  it("compacting 50k entries with 80% garbage - < 2000ms", { timeout: 60000 }, () => {
    const tasks = bucket.table("tasks");
    for (let round = 0; round < 5; round++) {
      for (let i = 0; i < 10_000; i++) {
        tasks.put(`task:${i}`, { id: i, round });
      }
    }

    const [result, ms] = clock.measure(() => tasks.compact());
    console.log(`compact: reclaimed ${result.reclaimedBytes} bytes in ${ms.toFixed(2)}ms`);

    expect(result.liveRecords).toBe(10_000);
    expect(result.bytesAfter).toBeLessThan(result.bytesBefore);
    expect(ms).toBeLessThan(2000);
  });
});
