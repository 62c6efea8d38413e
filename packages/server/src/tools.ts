/**
 * MCP tool implementations over a TaskAdapter
 *
 * Domain failures come back as `isError` results carrying
 * `{ "error": { "code", "message" } }`; they never reach the protocol layer.
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { describeError, logger as defaultLogger, type Logger, type TaskAdapter } from "@taskbridge/sdk";
import {
  CreateContainerInputSchema,
  CreateTaskInputSchema,
  formatZodError,
  GetDayTasksInputSchema,
  ListTasksInputSchema,
  ScheduleTaskInputSchema,
  UpdateTaskInputSchema,
} from "./schemas.js";
import { metrics as defaultMetrics, recordToolExecution, type MetricsRegistry } from "./observability/metrics.js";

export const TOOL_NAMES = [
  "list_tasks",
  "create_task",
  "create_project",
  "create_category",
  "update_task",
  "schedule_task",
  "get_day_tasks",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

export interface ToolSet {
  definitions: Tool[];
  handlers: Record<ToolName, ToolHandler>;
}

export interface ToolOptions {
  logger?: Logger;
  metrics?: MetricsRegistry;
  /** Upper bound on one read-only tool call, store round-trips included */
  timeoutMs?: number;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

export class ToolTimeoutError extends Error {
  readonly code = "E_TIMEOUT";

  constructor(tool: string, timeoutMs: number) {
    super(`Tool '${tool}' timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

/**
 * Map anything thrown by a tool onto the `{ code, message }` error body
 */
export function toToolError(error: unknown): { code: string; message: string } {
  if (error instanceof z.ZodError) {
    return { code: "E_INPUT", message: `Invalid arguments: ${formatZodError(error)}` };
  }
  if (error instanceof ToolTimeoutError) {
    return { code: error.code, message: error.message };
  }
  return describeError(error);
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(error: { code: string; message: string }): CallToolResult {
  return { isError: true, content: [{ type: "text", text: JSON.stringify({ error }, null, 2) }] };
}

const LIST_TASKS_DESCRIPTION = `Get every open project, category and task as one nested structure.

Keys are project and category titles. The abbreviations used are:
- "id": Friendly ID to use in other tools ("t1" tasks, "p1" projects, "c1" categories, "p0" the Inbox)
- "t": Task title
- "due": Due date (YYYY-MM-DD)
- "est": Time estimate ("30m", "2h", "1.5h")
- "pri": Priority, 1-3 with 3 the highest
- "tasks": Tasks directly inside the project or category
- "sub": Projects and categories nested inside this one

Tasks without a project are listed under "Inbox". Example:
{
  "Inbox": {
    "id": "p0",
    "tasks": [
      {"t": "Call the bank", "id": "t4", "est": "30m"}
    ]
  },
  "Work": {
    "id": "c1",
    "sub": {
      "Quarterly report": {
        "id": "p1",
        "pri": 3,
        "due": "2025-05-01",
        "tasks": [
          {"t": "Collect figures", "id": "t1", "due": "2025-04-25", "est": "2h", "pri": 2}
        ]
      }
    }
  }
}`;

const PARENT_DESCRIPTION =
  'Friendly ID of the project ("p1") or category ("c1") to place it in';

/**
 * Tool definitions advertised to clients
 *
 * `readOnlyHint` marks the tools that stay available in read-only mode.
 */
export const toolDefinitions: Tool[] = [
  {
    name: "list_tasks",
    description: LIST_TASKS_DESCRIPTION,
    inputSchema: { type: "object", properties: {} },
    annotations: { readOnlyHint: true },
  },
  {
    name: "create_task",
    description: `Create a task, in the Inbox unless a parent is given.

Time estimates are written like "30m", "1.5h" or "1h 30m". Priority is 1-3 with 3 the highest.`,
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", description: "Task title" },
        parentId: {
          type: "string",
          description: `${PARENT_DESCRIPTION}; omit it or use "p0" for the Inbox`,
        },
        dueDate: { type: "string", description: "Due date (YYYY-MM-DD)" },
        timeEstimate: { type: "string", description: 'Estimate such as "30m", "1.5h" or "1h 30m"' },
        priority: { type: "string", description: "Priority 1-3, 3 being the highest" },
      },
      required: ["title"],
    },
  },
  {
    name: "create_project",
    description: `Create a project. Projects hold tasks and other projects.`,
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", description: "Project title" },
        parentId: { type: "string", description: `${PARENT_DESCRIPTION}; omit it for the top level` },
        dueDate: { type: "string", description: "Due date (YYYY-MM-DD)" },
        priority: { type: "string", description: "Priority 1-3, 3 being the highest" },
      },
      required: ["title"],
    },
  },
  {
    name: "create_category",
    description: `Create a category.

Categories are long-lived folders for areas such as "Work", "Health" or "Household".
They can hold projects, tasks and other categories.`,
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", description: "Category title" },
        parentId: { type: "string", description: `${PARENT_DESCRIPTION}; omit it for the top level` },
        dueDate: { type: "string", description: "Due date (YYYY-MM-DD)" },
        priority: { type: "string", description: "Priority 1-3, 3 being the highest" },
      },
      required: ["title"],
    },
  },
  {
    name: "update_task",
    description: `Change the title, parent, due date, time estimate or priority of a task.

An empty parentId moves the task to the Inbox. An empty dueDate, timeEstimate or priority clears it.
Use schedule_task to plan the day a task is worked on.`,
    inputSchema: {
      type: "object",
      properties: {
        taskId: { type: "string", description: 'Friendly ID of the task ("t1")' },
        title: { type: "string", description: "New title" },
        parentId: { type: "string", description: PARENT_DESCRIPTION },
        dueDate: { type: "string", description: "New due date (YYYY-MM-DD)" },
        timeEstimate: { type: "string", description: 'New estimate such as "30m" or "1h 30m"' },
        priority: { type: "string", description: "New priority 1-3" },
      },
      required: ["taskId"],
    },
  },
  {
    name: "schedule_task",
    description: "Plan a task for a given day. This is the day it is worked on, not its due date.",
    inputSchema: {
      type: "object",
      properties: {
        taskId: { type: "string", description: 'Friendly ID of the task ("t1")' },
        day: { type: "string", description: "Day to work on it (YYYY-MM-DD)" },
      },
      required: ["taskId", "day"],
    },
  },
  {
    name: "get_day_tasks",
    description: `List the tasks planned for a day, completed ones included.

Each entry carries "done" along with the usual "t", "id", "due", "est" and "pri" fields.`,
    inputSchema: {
      type: "object",
      properties: {
        day: { type: "string", description: "Day to list (YYYY-MM-DD), e.g. 2025-05-14" },
      },
      required: ["day"],
    },
    annotations: { readOnlyHint: true },
  },
];

export const READ_ONLY_TOOLS: ReadonlySet<string> = new Set(
  toolDefinitions.filter((tool) => tool.annotations?.readOnlyHint === true).map((tool) => tool.name)
);

/**
 * Bind every tool to an adapter
 */
export function createTools(adapter: TaskAdapter, options: ToolOptions = {}): ToolSet {
  const log = options.logger ?? defaultLogger;
  const registry = options.metrics ?? defaultMetrics;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

  // Only read-only calls are bounded; a started write runs to completion
  function withTimeout(
    tool: ToolName,
    pending: Promise<CallToolResult>,
    onTimer: (id: ReturnType<typeof setTimeout>) => void
  ): Promise<CallToolResult> {
    if (!READ_ONLY_TOOLS.has(tool)) {
      return pending;
    }
    const timeout = new Promise<never>((_, reject) => {
      onTimer(setTimeout(() => reject(new ToolTimeoutError(tool, timeoutMs)), timeoutMs));
    });
    return Promise.race([pending, timeout]);
  }

  // Run one call with logging and metrics; failures become error results
  async function executeTool(tool: ToolName, handler: () => Promise<CallToolResult>): Promise<CallToolResult> {
    const startTime = Date.now();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    try {
      const result = await withTimeout(tool, handler(), (id) => {
        timeoutId = id;
      });
      const duration_ms = Date.now() - startTime;
      log.info("tool.success", { tool, duration_ms });
      recordToolExecution(registry, tool, duration_ms);
      return result;
    } catch (err) {
      const error = toToolError(err);
      const duration_ms = Date.now() - startTime;
      log.error("tool.error", { tool, duration_ms, err_code: error.code, err_message: error.message });
      recordToolExecution(registry, tool, duration_ms, error.code);
      return errorResult(error);
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
    }
  }

  const handlers: Record<ToolName, ToolHandler> = {
    list_tasks: (args) =>
      executeTool("list_tasks", async () => {
        ListTasksInputSchema.parse(args ?? {});
        return textResult(await adapter.listHierarchy());
      }),

    create_task: (args) =>
      executeTool("create_task", async () => {
        const input = CreateTaskInputSchema.parse(args ?? {});
        return jsonResult(await adapter.createWorkUnit(input));
      }),

    create_project: (args) =>
      executeTool("create_project", async () => {
        const input = CreateContainerInputSchema.parse(args ?? {});
        return jsonResult(await adapter.createContainer({ ...input, kind: "project" }));
      }),

    create_category: (args) =>
      executeTool("create_category", async () => {
        const input = CreateContainerInputSchema.parse(args ?? {});
        return jsonResult(await adapter.createContainer({ ...input, kind: "category" }));
      }),

    update_task: (args) =>
      executeTool("update_task", async () => {
        const { taskId, ...changes } = UpdateTaskInputSchema.parse(args ?? {});
        return jsonResult(await adapter.updateWorkUnit(taskId, changes));
      }),

    schedule_task: (args) =>
      executeTool("schedule_task", async () => {
        const { taskId, day } = ScheduleTaskInputSchema.parse(args ?? {});
        return jsonResult(await adapter.scheduleWorkUnit(taskId, day));
      }),

    get_day_tasks: (args) =>
      executeTool("get_day_tasks", async () => {
        const { day } = GetDayTasksInputSchema.parse(args ?? {});
        return jsonResult(await adapter.listDayWorkUnits(day));
      }),
  };

  return { definitions: toolDefinitions, handlers };
}
