/**
 * Performance benchmarks for hierarchy rendering
 * Run with: npm run bench
 */

import { describe, it, expect, beforeEach } from "vitest";
import { containerDoc, MemoryStore, openAdapter, workUnitDoc } from "@taskbridge/testkit";
import type { StoreDocument } from "../src/types.js";
import type { TaskAdapter } from "../src/adapter.js";

const PROJECTS = 200;
const TASKS_PER_PROJECT = 25;

function workspace(): StoreDocument[] {
  const docs: StoreDocument[] = [];
  for (let p = 1; p <= PROJECTS; p++) {
    // Every tenth project nests under the one before it
    const parentId = p % 10 === 0 ? `proj-${p - 1}` : "root";
    docs.push(containerDoc(`proj-${p}`, { title: `Project ${p}`, parentId, createdAt: p }));
    for (let t = 1; t <= TASKS_PER_PROJECT; t++) {
      docs.push(
        workUnitDoc(`task-${p}-${t}`, {
          title: `Task ${p}.${t}`,
          parentId: `proj-${p}`,
          createdAt: PROJECTS + p * TASKS_PER_PROJECT + t,
          timeEstimate: (t % 4) * 900_000,
          isStarred: t % 3 === 0 ? 2 : undefined,
        })
      );
    }
  }
  return docs;
}

describe("Hierarchy Performance Benchmarks", () => {
  let adapter: TaskAdapter;

  beforeEach(async () => {
    adapter = await openAdapter(new MemoryStore(workspace()));
  });

  it("5000 tasks - warm listHierarchy < 100ms", { timeout: 30000 }, async () => {
    await adapter.listHierarchy();

    const start = Date.now();
    const text = await adapter.listHierarchy();
    const duration = Date.now() - start;

    console.log(`listHierarchy: ${text.length} chars in ${duration}ms`);
    expect(duration).toBeLessThanOrEqual(100);
    expect(text).toContain('"Project 200"');
  });
});
