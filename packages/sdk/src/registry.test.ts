/**
 * Tests for FriendlyIdRegistry
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FriendlyIdRegistry, INBOX_TOKEN } from "./registry.js";
import { InvalidTokenError } from "./errors.js";
import { silentLogger } from "./observability/logs.js";
import { toContainerRecord, toWorkUnitRecord } from "./documents.js";
import { captureLogger, categoryDoc, containerDoc, workUnitDoc } from "@taskbridge/testkit";

describe("FriendlyIdRegistry", () => {
  let registry: FriendlyIdRegistry;

  beforeEach(() => {
    registry = new FriendlyIdRegistry(silentLogger());
  });

  describe("resolveToken", () => {
    it("should return the same token for the same ID", () => {
      const first = registry.resolveToken("task-a", "task");
      expect(registry.resolveToken("task-a", "task")).toBe(first);
      expect(first).toBe("t1");
    });

    it("should count up from 1 in each namespace independently", () => {
      expect(registry.resolveToken("task-a", "task")).toBe("t1");
      expect(registry.resolveToken("task-b", "task")).toBe("t2");
      expect(registry.resolveToken("proj-a", "project")).toBe("p1");
      expect(registry.resolveToken("cat-a", "category")).toBe("c1");
      expect(registry.resolveToken("proj-b", "project")).toBe("p2");
    });

    it("should refuse an empty ID", () => {
      expect(() => registry.resolveToken("", "task")).toThrow(
        "Cannot allocate a task token for an empty ID"
      );
    });
  });

  describe("resolvePersistentId", () => {
    it("should map tokens back to their IDs", () => {
      const token = registry.resolveToken("task-a", "task");
      expect(registry.resolvePersistentId(token)).toBe("task-a");
      expect(registry.resolvePersistentId(token, "task")).toBe("task-a");
    });

    it("should reserve p0 for the Inbox", () => {
      expect(INBOX_TOKEN).toBe("p0");
      expect(registry.resolvePersistentId("p0", "project")).toBe("unassigned");
      expect(registry.resolveToken("unassigned", "project")).toBe("p0");
      expect(registry.resolveToken("proj-a", "project")).toBe("p1");
    });

    it("should reject tokens that were never handed out", () => {
      expect(() => registry.resolvePersistentId("t99")).toThrow(InvalidTokenError);
    });

    it("should reject unknown prefixes", () => {
      expect(() => registry.resolvePersistentId("x1")).toThrow(InvalidTokenError);
      expect(() => registry.resolvePersistentId("t")).toThrow(InvalidTokenError);
      expect(() => registry.resolvePersistentId("")).toThrow(InvalidTokenError);
    });

    it("should reject tokens from another namespace", () => {
      registry.resolveToken("proj-a", "project");
      expect(() => registry.resolvePersistentId("p1", "task")).toThrow(
        "Invalid task ID: 'p1'. Use a task ID (t1, t2, ...) from list_tasks results."
      );
    });

    it("should carry the token and expected namespace", () => {
      try {
        registry.resolvePersistentId("t7", "task");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidTokenError);
        if (err instanceof InvalidTokenError) {
          expect(err.code).toBe("E_TOKEN");
          expect(err.token).toBe("t7");
          expect(err.expected).toBe("task");
        }
      }
    });
  });

  describe("namespaceOf", () => {
    it("should read the prefix of well-formed tokens", () => {
      expect(registry.namespaceOf("t12")).toBe("task");
      expect(registry.namespaceOf("p0")).toBe("project");
      expect(registry.namespaceOf("c3")).toBe("category");
      expect(registry.namespaceOf("P1")).toBeUndefined();
      expect(registry.namespaceOf("t1x")).toBeUndefined();
    });
  });

  describe("seed", () => {
    const containers = [
      containerDoc("proj-late", { createdAt: 300 }),
      categoryDoc("cat-b", { createdAt: 200 }),
      containerDoc("proj-early", { createdAt: 100 }),
      categoryDoc("cat-a", { createdAt: 50 }),
      containerDoc("proj-undated", { createdAt: undefined }),
    ].map(toContainerRecord);
    const workUnits = [
      workUnitDoc("task-2", { createdAt: 20 }),
      workUnitDoc("task-1a", { createdAt: 10 }),
      workUnitDoc("task-1b", { createdAt: 10 }),
    ].map(toWorkUnitRecord);

    it("should allocate categories, then projects, then tasks by creation time", () => {
      registry.seed(containers, workUnits);

      expect(registry.entries("category")).toEqual([
        ["c1", "cat-a"],
        ["c2", "cat-b"],
      ]);
      expect(registry.entries("project")).toEqual([
        ["p0", "unassigned"],
        ["p1", "proj-undated"],
        ["p2", "proj-early"],
        ["p3", "proj-late"],
      ]);
      expect(registry.entries("task")).toEqual([
        ["t1", "task-1a"],
        ["t2", "task-1b"],
        ["t3", "task-2"],
      ]);
    });

    it("should give two fresh registries identical assignments", () => {
      const other = new FriendlyIdRegistry(silentLogger());
      registry.seed(containers, workUnits);
      other.seed(containers, workUnits);

      for (const namespace of ["task", "project", "category"] as const) {
        expect(other.entries(namespace)).toEqual(registry.entries(namespace));
      }
    });

    it("should keep allocating after the seeded tokens", () => {
      registry.seed(containers, workUnits);
      expect(registry.resolveToken("task-new", "task")).toBe("t4");
    });

    it("should log the seeded counts", () => {
      const logs = captureLogger("info");
      const logged = new FriendlyIdRegistry(logs.logger);
      logged.seed(containers, workUnits);

      expect(logs.events()).toEqual([
        expect.objectContaining({ event: "registry.init", categories: 2, projects: 3, tasks: 3 }),
      ]);
    });
  });
});
