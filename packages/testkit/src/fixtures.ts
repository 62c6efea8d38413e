/**
 * Document fixtures and log capture for tests
 */

import {
  Logger,
  silentLogger,
  TaskAdapter,
  TaskRepository,
  type LogLevel,
  type RemoteStore,
  type StoreDocument,
} from "@taskbridge/sdk";

/** 2024-01-15T09:00:00.000Z */
export const FIXED_NOW = 1_705_309_200_000;

export function fixedClock(now: number = FIXED_NOW): () => number {
  return () => now;
}

/**
 * Open project at the top level unless `fields` says otherwise
 */
export function containerDoc(id: string, fields: Record<string, unknown> = {}): StoreDocument {
  return {
    db: "Categories",
    type: "project",
    title: "Untitled",
    parentId: "root",
    createdAt: 0,
    ...fields,
    _id: id,
  };
}

export function categoryDoc(id: string, fields: Record<string, unknown> = {}): StoreDocument {
  return containerDoc(id, { type: "category", ...fields });
}

/**
 * Open work-unit in the Inbox unless `fields` says otherwise
 */
export function workUnitDoc(id: string, fields: Record<string, unknown> = {}): StoreDocument {
  return {
    db: "Tasks",
    title: "Untitled Task",
    parentId: "unassigned",
    createdAt: 0,
    ...fields,
    _id: id,
  };
}

/**
 * Small workspace: category "Work" holding project "Launch" with one task,
 * a top-level project "Home", and one task in the Inbox
 *
 * Seeded tokens are c1 Work, p1 Launch, p2 Home, t1 "Draft plan", t2 "Buy milk".
 */
export function sampleDocuments(): StoreDocument[] {
  return [
    categoryDoc("cat-work", { title: "Work", createdAt: 1 }),
    containerDoc("proj-launch", { title: "Launch", parentId: "cat-work", createdAt: 2 }),
    containerDoc("proj-home", { title: "Home", createdAt: 3 }),
    workUnitDoc("task-a", {
      title: "Draft plan",
      parentId: "proj-launch",
      createdAt: 10,
      timeEstimate: 3_600_000,
    }),
    workUnitDoc("task-b", { title: "Buy milk", createdAt: 11 }),
  ];
}

/**
 * Adapter over `store` with the fixed clock, registry seeded as in production
 */
export function openAdapter(store: RemoteStore, logger: Logger = silentLogger()): Promise<TaskAdapter> {
  return TaskAdapter.open(new TaskRepository(store, { logger, clock: fixedClock() }), { logger });
}

export interface CapturedLogs {
  logger: Logger;
  lines: string[];
  /** Parsed log events */
  events(): Array<Record<string, unknown>>;
  /** Event names in emission order */
  names(): string[];
}

export function captureLogger(level: LogLevel = "debug"): CapturedLogs {
  const lines: string[] = [];
  const logger = new Logger(level, (line) => lines.push(line));

  const events = (): Array<Record<string, unknown>> =>
    lines.map((line) => {
      const value: unknown = JSON.parse(line);
      return typeof value === "object" && value !== null ? Object.fromEntries(Object.entries(value)) : {};
    });

  return {
    logger,
    lines,
    events,
    names: () => events().map((event) => String(event.event)),
  };
}
