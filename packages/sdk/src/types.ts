/**
 * Core types for TaskBridge
 */

/**
 * Raw document as held by the remote store
 */
export type StoreDocument = { _id: string; _rev?: string } & Record<string, unknown>;

/**
 * Document body submitted for creation; the store assigns `_id` when absent
 */
export type NewDocument = Record<string, unknown>;

/**
 * Mango selector understood by the remote store
 *
 * Field keys map to a literal value or an operator object such as
 * `{ $exists: false }`; `$or` takes a list of alternative sub-selectors.
 */
export type Selector = Record<string, unknown>;

/**
 * Result of probing the change feed since a cursor
 */
export interface ChangeProbe {
  /** True when at least one matching document changed after the cursor */
  matchedAny: boolean;
  /** Feed position to resume from next time */
  cursor: string;
}

/**
 * Operations the library needs from the remote document store
 */
export interface RemoteStore {
  findDocuments(selector: Selector): Promise<StoreDocument[]>;
  checkChanges(since: string, selector: Selector): Promise<ChangeProbe>;
  getDocument(id: string): Promise<StoreDocument>;
  putDocument(doc: StoreDocument): Promise<StoreDocument>;
  createDocument(doc: NewDocument): Promise<StoreDocument>;
  ping(): Promise<boolean>;
}

/**
 * Where a container or work-unit sits: top level, the Inbox, or under a container
 */
export type ParentRef =
  | { kind: "root" }
  | { kind: "unassigned" }
  | { kind: "container"; id: string };

export type ContainerKind = "project" | "category";

/** 1 is lowest, 3 highest */
export type Priority = 1 | 2 | 3;

/** Friendly-ID namespaces */
export type Namespace = "task" | "project" | "category";

/**
 * Grouping node (project or category) normalized from a store document
 */
export interface ContainerRecord {
  id: string;
  parent: ParentRef;
  title: string;
  kind: ContainerKind;
  priority?: Priority;
  dueDate?: string;
  done: boolean;
  createdAt: number;
}

/**
 * Leaf task normalized from a store document
 */
export interface WorkUnitRecord {
  id: string;
  parent: ParentRef;
  title: string;
  dueDate?: string;
  /** Milliseconds */
  timeEstimate?: number;
  priority?: Priority;
  done: boolean;
  day?: string;
  createdAt: number;
  masterRank?: number;
}

/**
 * Abbreviated work-unit as rendered in hierarchy output
 */
export interface TaskSummary {
  t: string;
  id: string;
  due?: string;
  est?: string;
  pri?: Priority;
}

export interface DayTaskSummary extends TaskSummary {
  done: boolean;
  /** Scheduled day; omitted while unscheduled */
  day?: string;
}

export interface HierarchyNode {
  id?: string;
  pri?: Priority;
  due?: string;
  tasks?: TaskSummary[];
  sub?: Hierarchy;
}

/**
 * Ordered title → node map; a repeated title keeps its first position and last value
 */
export type Hierarchy = Map<string, HierarchyNode>;

/** Priority as supplied by callers: 1-3 as a number or numeric string */
export type PriorityInput = number | string;

export interface CreateWorkUnitInput {
  title: string;
  /** Container token (p… or c…); defaults to the Inbox */
  parentId?: string;
  dueDate?: string;
  /** Human estimate such as "30m", "1.5h" or "1h 30m" */
  timeEstimate?: string;
  priority?: PriorityInput;
}

export interface CreateContainerInput {
  title: string;
  kind: ContainerKind;
  /** Container token; defaults to the top level */
  parentId?: string;
  dueDate?: string;
  priority?: PriorityInput;
}

/**
 * Field changes for an existing work-unit
 *
 * An empty string for `dueDate`, `timeEstimate` or `priority` clears the field.
 */
export interface UpdateWorkUnitInput {
  title?: string;
  parentId?: string;
  dueDate?: string;
  timeEstimate?: string;
  priority?: PriorityInput;
}

export interface WorkUnitEcho {
  id: string;
  title: string;
  parentId?: string;
  dueDate?: string | null;
  timeEstimate?: string | null;
  priority?: Priority | null;
  day?: string;
}

export interface WorkUnitResult {
  task: WorkUnitEcho;
  message: string;
}

export interface ContainerEcho {
  id: string;
  title: string;
  kind: ContainerKind;
  parentId: string;
  dueDate?: string;
  priority?: Priority;
}

export interface ContainerResult {
  container: ContainerEcho;
  message: string;
}

export interface DayListing {
  date: string;
  tasks: DayTaskSummary[];
}
