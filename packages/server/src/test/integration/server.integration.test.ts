/**
 * End-to-end MCP tests: a protocol client talking to the server over an
 * in-memory transport pair
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { ConfigurationError, silentLogger } from "@taskbridge/sdk";
import { MemoryStore, openAdapter, sampleDocuments } from "@taskbridge/testkit";
import { MetricsRegistry } from "../../observability/metrics.js";
import { redirectConsoleToStderr, startServer, type RunningServer } from "../../server.js";
import { jsonOf, TEST_ENV, textOf } from "../helpers.js";

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0)) {
    await cleanup();
  }
});

async function connectClient(env: NodeJS.ProcessEnv = TEST_ENV): Promise<{
  client: Client;
  store: MemoryStore;
  running: RunningServer;
}> {
  const store = new MemoryStore(sampleDocuments());
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  const running = await startServer({
    env,
    transport: serverTransport,
    logger: silentLogger(),
    metrics: new MetricsRegistry(),
    connect: () => openAdapter(store),
  });
  if (running === null) {
    throw new Error("server did not start");
  }

  const client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);

  cleanups.push(async () => {
    await client.close();
    await running.close();
  });
  return { client, store, running };
}

async function call(client: Client, name: string, args: Record<string, unknown> = {}) {
  return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
}

describe("MCP server", () => {
  it("should list every tool", async () => {
    const { client } = await connectClient();
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "list_tasks",
      "create_task",
      "create_project",
      "create_category",
      "update_task",
      "schedule_task",
      "get_day_tasks",
    ]);
  });

  it("should run a create-then-list round over the protocol", async () => {
    const { client } = await connectClient();

    const created = await call(client, "create_task", { title: "Pay rent", dueDate: "2024-02-01" });
    expect(jsonOf(created)).toEqual({
      task: { id: "t3", title: "Pay rent", parentId: "p0", dueDate: "2024-02-01" },
      message: "Task 'Pay rent' created successfully with ID t3",
    });

    const listed = await call(client, "list_tasks");
    const tree = JSON.parse(textOf(listed));
    expect(tree.Inbox).toEqual({
      id: "p0",
      tasks: [
        { t: "Buy milk", id: "t2" },
        { t: "Pay rent", id: "t3", due: "2024-02-01" },
      ],
    });
  });

  it("should return domain failures as error results", async () => {
    const { client } = await connectClient();
    const result = await call(client, "schedule_task", { taskId: "p1", day: "2024-01-15" });

    expect(result.isError).toBe(true);
    expect(jsonOf(result)).toEqual({
      error: {
        code: "E_TOKEN",
        message: "Invalid task ID: 'p1'. Use a task ID (t1, t2, ...) from list_tasks results.",
      },
    });
  });

  it("should reject unknown tools", async () => {
    const { client } = await connectClient();
    await expect(client.callTool({ name: "delete_task", arguments: {} })).rejects.toThrow(
      "Unknown tool: delete_task"
    );
  });

  describe("read-only mode", () => {
    const readOnlyEnv = { ...TEST_ENV, TASKBRIDGE_READONLY: "true" };

    it("should only advertise reads", async () => {
      const { client } = await connectClient(readOnlyEnv);
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).toEqual(["list_tasks", "get_day_tasks"]);
    });

    it("should refuse writes", async () => {
      const { client, store } = await connectClient(readOnlyEnv);
      store.resetCalls();

      await expect(
        client.callTool({ name: "create_task", arguments: { title: "Nope" } })
      ).rejects.toThrow("Tool 'create_task' not available in read-only mode");
      expect(store.calls).toEqual([]);
    });
  });

  describe("startup", () => {
    it("should not start when disabled", async () => {
      const connect = vi.fn(() => openAdapter(new MemoryStore()));
      const running = await startServer({
        env: { ...TEST_ENV, TASKBRIDGE_ENABLED: "false" },
        logger: silentLogger(),
        connect,
      });

      expect(running).toBeNull();
      expect(connect).not.toHaveBeenCalled();
    });

    it("should fail on missing connection settings", async () => {
      await expect(
        startServer({ env: { DB_URL: "http://localhost:5984" }, logger: silentLogger() })
      ).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});

describe("redirectConsoleToStderr", () => {
  it("should send stdout console methods to stderr", () => {
    const original = { log: console.log, info: console.info, debug: console.debug };
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    try {
      redirectConsoleToStderr();
      console.log("stray", 1);
      console.debug("noise");
    } finally {
      Object.assign(console, original);
    }

    expect(stderr.mock.calls).toEqual([
      ["[WARN] Attempted console.log (redirected to stderr):", "stray", 1],
      ["[WARN] Attempted console.debug (redirected to stderr):", "noise"],
    ]);
  });
});
