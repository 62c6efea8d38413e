/**
 * Projection of raw store documents into typed records
 */

import type {
  ContainerRecord,
  ParentRef,
  StoreDocument,
  WorkUnitRecord,
} from "./types.js";
import { normalizePriority } from "./validation.js";

export const ROOT_PARENT = "root";
export const UNASSIGNED_PARENT = "unassigned";
/** Per-field modification timestamps kept by the store; never exposed */
export const BOOKKEEPING_FIELD = "fieldUpdates";

export const DEFAULT_CONTAINER_TITLE = "Untitled";
export const DEFAULT_WORK_UNIT_TITLE = "Untitled Task";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStoreDocument(value: unknown): value is StoreDocument {
  return isRecord(value) && typeof value._id === "string" && value._id.length > 0;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Map the stored `parentId` sentinel strings onto a ParentRef
 */
export function parseParentId(raw: unknown): ParentRef {
  if (raw === undefined || raw === null || raw === "" || raw === ROOT_PARENT) {
    return { kind: "root" };
  }
  if (raw === UNASSIGNED_PARENT) {
    return { kind: "unassigned" };
  }
  return { kind: "container", id: String(raw) };
}

export function formatParentRef(ref: ParentRef): string {
  switch (ref.kind) {
    case "root":
      return ROOT_PARENT;
    case "unassigned":
      return UNASSIGNED_PARENT;
    case "container":
      return ref.id;
  }
}

/**
 * Copy of the document without its bookkeeping field
 */
export function stripBookkeeping(doc: StoreDocument): StoreDocument {
  if (!(BOOKKEEPING_FIELD in doc)) {
    return doc;
  }
  const view: StoreDocument = { ...doc };
  delete view[BOOKKEEPING_FIELD];
  return view;
}

export function toContainerRecord(doc: StoreDocument): ContainerRecord {
  return {
    id: doc._id,
    parent: parseParentId(doc.parentId),
    title: readString(doc.title) ?? DEFAULT_CONTAINER_TITLE,
    kind: doc.type === "category" ? "category" : "project",
    priority: normalizePriority(doc.priority) ?? normalizePriority(doc.isStarred),
    dueDate: readString(doc.dueDate),
    done: doc.done === true,
    createdAt: readNumber(doc.createdAt) ?? 0,
  };
}

export function toWorkUnitRecord(doc: StoreDocument): WorkUnitRecord {
  return {
    id: doc._id,
    parent: parseParentId(doc.parentId),
    title: readString(doc.title) ?? DEFAULT_WORK_UNIT_TITLE,
    dueDate: readString(doc.dueDate),
    timeEstimate: readNumber(doc.timeEstimate),
    priority: normalizePriority(doc.isStarred),
    done: doc.done === true,
    day: readString(doc.day),
    createdAt: readNumber(doc.createdAt) ?? 0,
    masterRank: readNumber(doc.masterRank),
  };
}
