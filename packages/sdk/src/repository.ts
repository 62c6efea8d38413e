/**
 * Store-facing reads and writes for containers and work-units
 */

import { ChangeGatedCache, type CacheStats } from "./cache.js";
import {
  BOOKKEEPING_FIELD,
  isRecord,
  stripBookkeeping,
  toContainerRecord,
  toWorkUnitRecord,
  UNASSIGNED_PARENT,
} from "./documents.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import type {
  ContainerKind,
  ContainerRecord,
  NewDocument,
  Priority,
  RemoteStore,
  Selector,
  StoreDocument,
  WorkUnitRecord,
} from "./types.js";

const NOT_DONE = [{ done: false }, { done: { $exists: false } }];

export const CONTAINER_SELECTOR: Selector = { db: "Categories", $or: NOT_DONE };
export const WORK_UNIT_SELECTOR: Selector = { db: "Tasks", $or: NOT_DONE };

export function childWorkUnitSelector(parentId: string): Selector {
  return { ...WORK_UNIT_SELECTOR, parentId };
}

export function dayWorkUnitSelector(day: string): Selector {
  return { db: "Tasks", day };
}

export interface WorkUnitDraft {
  title: string;
  /** Persistent parent ID or sentinel */
  parentId: string;
  dueDate?: string;
  timeEstimate?: number;
  priority?: Priority;
  day?: string;
}

export interface ContainerDraft {
  title: string;
  parentId: string;
  kind: ContainerKind;
  dueDate?: string;
  priority?: Priority;
}

/**
 * Stored field changes; `null` clears a field
 */
export interface WorkUnitChanges {
  title?: string;
  parentId?: string;
  dueDate?: string | null;
  timeEstimate?: number | null;
  isStarred?: Priority | null;
  day?: string;
}

export interface RepositoryOptions {
  logger?: Logger;
  /** Epoch-millisecond clock for timestamps */
  clock?: () => number;
}

function numberField(doc: StoreDocument, field: string): number | undefined {
  const value = doc[field];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Next `rank` across the collection and next `masterRank` among siblings
 */
export function nextRanks(
  docs: readonly StoreDocument[],
  parentId: string
): { rank: number; masterRank: number } {
  let rank = 0;
  let masterRank = 0;
  for (const doc of docs) {
    rank = Math.max(rank, numberField(doc, "rank") ?? 0);
    if (doc.parentId === parentId) {
      masterRank = Math.max(masterRank, numberField(doc, "masterRank") ?? 0);
    }
  }
  return { rank: rank + 1, masterRank: masterRank + 1 };
}

/**
 * Day listing order: open before done, higher priority first, then higher masterRank
 */
export function compareDayOrder(a: WorkUnitRecord, b: WorkUnitRecord): number {
  return (
    Number(a.done) - Number(b.done) ||
    (b.priority ?? 0) - (a.priority ?? 0) ||
    (b.masterRank ?? 0) - (a.masterRank ?? 0)
  );
}

export class TaskRepository {
  #store: RemoteStore;
  #containers: ChangeGatedCache;
  #workUnits: ChangeGatedCache;
  #logger: Logger;
  #clock: () => number;

  constructor(store: RemoteStore, options: RepositoryOptions = {}) {
    this.#store = store;
    this.#logger = options.logger ?? defaultLogger;
    this.#clock = options.clock ?? Date.now;
    this.#containers = new ChangeGatedCache({
      store,
      selector: CONTAINER_SELECTOR,
      name: "containers",
      logger: this.#logger,
    });
    this.#workUnits = new ChangeGatedCache({
      store,
      selector: WORK_UNIT_SELECTOR,
      name: "workUnits",
      logger: this.#logger,
    });
  }

  async listContainers(): Promise<ContainerRecord[]> {
    return (await this.#containers.fetch()).map(toContainerRecord);
  }

  /**
   * Open work-units; scoping to one parent reads the store directly
   */
  async listWorkUnits(parentId?: string): Promise<WorkUnitRecord[]> {
    const docs =
      parentId === undefined
        ? await this.#workUnits.fetch()
        : (await this.#store.findDocuments(childWorkUnitSelector(parentId))).map(stripBookkeeping);
    return docs.map(toWorkUnitRecord);
  }

  /**
   * Work-units scheduled for a day, completed ones included
   */
  async listWorkUnitsForDay(day: string): Promise<WorkUnitRecord[]> {
    const docs = await this.#store.findDocuments(dayWorkUnitSelector(day));
    return docs.map(stripBookkeeping).map(toWorkUnitRecord).sort(compareDayOrder);
  }

  async createWorkUnit(draft: WorkUnitDraft): Promise<StoreDocument> {
    const { rank, masterRank } = nextRanks(await this.#workUnits.fetch(), draft.parentId);
    const now = this.#clock();

    const doc: NewDocument = {
      db: "Tasks",
      title: draft.title,
      parentId: draft.parentId,
      createdAt: now,
      updatedAt: now,
      rank,
      masterRank,
      day: draft.day ?? UNASSIGNED_PARENT,
    };
    if (draft.dueDate !== undefined) doc.dueDate = draft.dueDate;
    if (draft.timeEstimate !== undefined) doc.timeEstimate = draft.timeEstimate;
    if (draft.priority !== undefined) doc.isStarred = draft.priority;
    doc[BOOKKEEPING_FIELD] = {};

    const created = await this.#store.createDocument(doc);
    this.#logger.info("store.create", { kind: "task", id: created._id });
    return stripBookkeeping(created);
  }

  async createContainer(draft: ContainerDraft): Promise<StoreDocument> {
    const { rank, masterRank } = nextRanks(await this.#containers.fetch(), draft.parentId);
    const now = this.#clock();

    const doc: NewDocument = {
      db: "Categories",
      type: draft.kind,
      title: draft.title,
      parentId: draft.parentId,
      createdAt: now,
      updatedAt: now,
      rank,
      masterRank,
    };
    if (draft.dueDate !== undefined) doc.dueDate = draft.dueDate;
    if (draft.priority !== undefined) doc.priority = draft.priority;

    const created = await this.#store.createDocument(doc);
    this.#logger.info("store.create", { kind: draft.kind, id: created._id });
    return stripBookkeeping(created);
  }

  /**
   * Apply field changes to the latest stored revision, stamping each changed field
   */
  async updateWorkUnit(id: string, changes: WorkUnitChanges): Promise<StoreDocument> {
    const current = await this.#store.getDocument(id);
    const now = this.#clock();
    const recorded = current[BOOKKEEPING_FIELD];
    const history: Record<string, unknown> = isRecord(recorded) ? { ...recorded } : {};

    const next: StoreDocument = { ...current, updatedAt: now };
    const changed: string[] = [];
    const entries: Array<[string, unknown]> = Object.entries(changes);
    for (const [field, value] of entries) {
      if (value === undefined) continue;
      next[field] = value;
      history[field] = now;
      changed.push(field);
    }
    next[BOOKKEEPING_FIELD] = history;

    const saved = await this.#store.putDocument(next);
    this.#logger.info("store.update", { id, fields: changed });
    return stripBookkeeping(saved);
  }

  ping(): Promise<boolean> {
    return this.#store.ping();
  }

  cacheStats(): { containers: CacheStats; workUnits: CacheStats } {
    return { containers: this.#containers.stats(), workUnits: this.#workUnits.stats() };
  }
}
