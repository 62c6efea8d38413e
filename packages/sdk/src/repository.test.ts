/**
 * Tests for TaskRepository over the in-memory store
 */

import { describe, it, expect } from "vitest";
import { compareDayOrder, nextRanks, TaskRepository } from "./repository.js";
import { StoreError } from "./errors.js";
import { silentLogger } from "./observability/logs.js";
import { toWorkUnitRecord } from "./documents.js";
import type { NewDocument } from "./types.js";
import { FIXED_NOW, fixedClock, MemoryStore, containerDoc, workUnitDoc } from "@taskbridge/testkit";

function setup(docs: NewDocument[] = []): { store: MemoryStore; repository: TaskRepository } {
  const store = new MemoryStore(docs);
  const repository = new TaskRepository(store, { logger: silentLogger(), clock: fixedClock() });
  return { store, repository };
}

describe("nextRanks", () => {
  it("should take the collection-wide rank and the sibling masterRank", () => {
    const docs = [
      workUnitDoc("task-1", { parentId: "proj-1", rank: 4, masterRank: 2 }),
      workUnitDoc("task-2", { parentId: "proj-2", rank: 7, masterRank: 9 }),
    ];
    expect(nextRanks(docs, "proj-1")).toEqual({ rank: 8, masterRank: 3 });
    expect(nextRanks([], "proj-1")).toEqual({ rank: 1, masterRank: 1 });
  });
});

describe("compareDayOrder", () => {
  it("should put open work first, then priority, then masterRank", () => {
    const units = [
      workUnitDoc("a", { done: true, isStarred: 3, masterRank: 1 }),
      workUnitDoc("b", { masterRank: 5 }),
      workUnitDoc("c", { isStarred: 2, masterRank: 1 }),
      workUnitDoc("d", { isStarred: 2, masterRank: 4 }),
    ].map(toWorkUnitRecord);

    expect([...units].sort(compareDayOrder).map((unit) => unit.id)).toEqual(["d", "c", "b", "a"]);
  });
});

describe("TaskRepository", () => {
  describe("reads", () => {
    it("should list open containers and work-units", async () => {
      const { repository } = setup([
        containerDoc("proj-1", { title: "Garden" }),
        containerDoc("proj-old", { title: "Finished", done: true }),
        workUnitDoc("task-1", { title: "Weed" }),
        workUnitDoc("task-old", { done: true }),
      ]);

      expect((await repository.listContainers()).map((c) => c.id)).toEqual(["proj-1"]);
      expect((await repository.listWorkUnits()).map((u) => u.id)).toEqual(["task-1"]);
    });

    it("should read one parent's work-units straight from the store", async () => {
      const { store, repository } = setup([
        workUnitDoc("task-1", { parentId: "proj-1" }),
        workUnitDoc("task-2", { parentId: "proj-2" }),
      ]);

      const units = await repository.listWorkUnits("proj-1");

      expect(units.map((u) => u.id)).toEqual(["task-1"]);
      expect(store.calls.map((call) => call.operation)).toEqual(["find"]);
      expect(repository.cacheStats().workUnits.refreshes).toBe(0);
    });

    it("should list a day's work-units including completed ones in day order", async () => {
      const { repository } = setup([
        workUnitDoc("a", { day: "2024-01-15", done: true, isStarred: 3 }),
        workUnitDoc("b", { day: "2024-01-15", masterRank: 5 }),
        workUnitDoc("c", { day: "2024-01-15", isStarred: 2 }),
        workUnitDoc("e", { day: "2024-01-16" }),
      ]);

      const units = await repository.listWorkUnitsForDay("2024-01-15");

      expect(units.map((u) => u.id)).toEqual(["c", "b", "a"]);
    });
  });

  describe("createWorkUnit", () => {
    it("should write ranks, timestamps, the default day and empty bookkeeping", async () => {
      const { store, repository } = setup([
        workUnitDoc("task-1", { parentId: "proj-1", rank: 4, masterRank: 2 }),
        workUnitDoc("task-2", { parentId: "proj-2", rank: 7, masterRank: 9 }),
      ]);

      const created = await repository.createWorkUnit({
        title: "New",
        parentId: "proj-1",
        timeEstimate: 1_800_000,
        priority: 2,
      });

      expect(created).toEqual({
        _id: "doc-1",
        _rev: "1-mem",
        db: "Tasks",
        title: "New",
        parentId: "proj-1",
        createdAt: FIXED_NOW,
        updatedAt: FIXED_NOW,
        rank: 8,
        masterRank: 3,
        day: "unassigned",
        timeEstimate: 1_800_000,
        isStarred: 2,
      });
      expect(store.peek("doc-1")?.fieldUpdates).toEqual({});
    });

    it("should leave absent optional fields out", async () => {
      const { store, repository } = setup();

      await repository.createWorkUnit({ title: "Bare", parentId: "unassigned" });

      const stored = store.peek("doc-1");
      expect(stored).not.toHaveProperty("dueDate");
      expect(stored).not.toHaveProperty("timeEstimate");
      expect(stored).not.toHaveProperty("isStarred");
    });
  });

  describe("createContainer", () => {
    it("should write the kind and priority", async () => {
      const { store, repository } = setup([containerDoc("proj-1", { rank: 3, masterRank: 3 })]);

      await repository.createContainer({
        title: "Research",
        parentId: "root",
        kind: "category",
        priority: 1,
      });

      expect(store.peek("doc-1")).toMatchObject({
        db: "Categories",
        type: "category",
        title: "Research",
        parentId: "root",
        rank: 4,
        masterRank: 4,
        priority: 1,
      });
    });
  });

  describe("updateWorkUnit", () => {
    it("should stamp every changed field and clear null ones", async () => {
      const { store, repository } = setup([
        workUnitDoc("task-1", { title: "Old", timeEstimate: 60_000, fieldUpdates: { title: 5 } }),
      ]);

      const saved = await repository.updateWorkUnit("task-1", {
        title: "New",
        timeEstimate: null,
        dueDate: undefined,
      });

      expect(saved).not.toHaveProperty("fieldUpdates");
      expect(saved._rev).toBe("2-mem");
      expect(store.peek("task-1")).toMatchObject({
        title: "New",
        timeEstimate: null,
        updatedAt: FIXED_NOW,
        fieldUpdates: { title: FIXED_NOW, timeEstimate: FIXED_NOW },
      });
      expect(store.peek("task-1")).not.toHaveProperty("dueDate");
    });

    it("should keep earlier history entries", async () => {
      const { store, repository } = setup([workUnitDoc("task-1", { fieldUpdates: { title: 5 } })]);

      await repository.updateWorkUnit("task-1", { day: "2024-01-15" });

      expect(store.peek("task-1")?.fieldUpdates).toEqual({ title: 5, day: FIXED_NOW });
    });

    it("should propagate a missing document", async () => {
      const { repository } = setup();
      await expect(repository.updateWorkUnit("nope", { title: "x" })).rejects.toBeInstanceOf(
        StoreError
      );
    });
  });
});
