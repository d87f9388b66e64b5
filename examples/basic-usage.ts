/**
 * Basic Usage Example
 *
 * Demonstrates tables, typed records, scans and compaction.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { rmSync } from "node:fs";
import { z } from "zod";
import { Structured, schemaCodec, withBucket } from "@bucketdb/sdk";

const Task = z.object({
  title: z.string().min(1),
  status: z.enum(["open", "closed"]),
  priority: z.number().int().min(1).max(10),
});

function main(): void {
  const dataDir = "./examples-data/basic";
  rmSync(dataDir, { recursive: true, force: true });

  withBucket(dataDir, (bucket) => {
    // Untyped table: any JSON value, raw bytes or Structured record
    console.log("📂 Opening table...");
    const notes = bucket.table("notes");
    notes.put("welcome", { text: "hello", pinned: true });
    notes.put("avatar", new Uint8Array([0x89, 0x50, 0x4e, 0x47]));
    notes.put("legacy", new Structured("note@1", { text: "tagged with its schema" }));
    console.log("✅ Stored 3 notes:", notes.keys());

    const id = notes.insert({ text: "stored under the next free id" });
    notes.putJson("settings", '{ "theme": "dark" }');
    console.log(`🆔 Inserted note ${id}; settings text:`, notes.getJson("settings"));

    // Typed table: records are validated on write
    console.log("\n✏️  Writing tasks...");
    const tasks = bucket.table("tasks", schemaCodec("task@1", Task));
    tasks.put("task-1", { title: "Learn bucketdb", status: "open", priority: 8 });
    tasks.put("task-2", { title: "Write docs", status: "open", priority: 5 });
    tasks.put("task-1", { title: "Learn bucketdb", status: "closed", priority: 8 });

    console.log("📖 task-1:", tasks.get("task-1"));
    console.log("❓ task-9:", tasks.get("task-9"));

    console.log("\n🔍 Scanning in key order...");
    for (const [key, task] of tasks.scan({ order: "key" })) {
      console.log(`  ${key}: [${task.status}] ${task.title}`);
    }

    console.log("\n🗑️  Deleting task-2...");
    tasks.delete("task-2");

    const stats = tasks.stats();
    console.log(`📊 ${stats.liveRecords} live, ${stats.garbageBytes}/${stats.fileBytes} bytes garbage`);

    const result = tasks.compact();
    console.log(`🧹 Compacted: ${result.bytesBefore} → ${result.bytesAfter} bytes`);

    console.log("\n📋 Tables:", bucket.listTables());
  });

  // Reopen to show the data survived
  withBucket(dataDir, (bucket) => {
    console.log("\n♻️  After reopen, task-1:", bucket.table("tasks").get("task-1"));
  });
}

main();
