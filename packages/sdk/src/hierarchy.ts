/**
 * Hierarchy assembly from flat parent-linked collections
 */

import { INBOX_TOKEN, type TokenResolver } from "./registry.js";
import { formatTimeEstimate } from "./time-estimate.js";
import type {
  ContainerRecord,
  DayTaskSummary,
  Hierarchy,
  HierarchyNode,
  ParentRef,
  TaskSummary,
  WorkUnitRecord,
} from "./types.js";
import { UNASSIGNED_PARENT } from "./documents.js";

export const INBOX_TITLE = "Inbox";

export function summarizeWorkUnit(unit: WorkUnitRecord, ids: TokenResolver): TaskSummary {
  const summary: TaskSummary = { t: unit.title, id: ids.resolveToken(unit.id, "task") };
  if (unit.dueDate !== undefined) summary.due = unit.dueDate;
  const est = formatTimeEstimate(unit.timeEstimate);
  if (est !== undefined) summary.est = est;
  if (unit.priority !== undefined) summary.pri = unit.priority;
  return summary;
}

/**
 * Work-unit summary for day listings, with completion status and scheduled day
 */
export function summarizeDayWorkUnit(unit: WorkUnitRecord, ids: TokenResolver): DayTaskSummary {
  const summary: DayTaskSummary = { ...summarizeWorkUnit(unit, ids), done: unit.done };
  if (unit.day !== undefined && unit.day !== UNASSIGNED_PARENT) {
    summary.day = unit.day;
  }
  return summary;
}

function groupByParent<T extends { parent: ParentRef }>(records: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    if (record.parent.kind !== "container") continue;
    const siblings = groups.get(record.parent.id);
    if (siblings) {
      siblings.push(record);
    } else {
      groups.set(record.parent.id, [record]);
    }
  }
  return groups;
}

/**
 * Build the title-keyed tree
 *
 * Top level holds the Inbox (only when something is unassigned) followed by
 * every root container. Sibling order follows fetch order; a repeated title
 * keeps the position of its first occurrence and the value of its last.
 */
export function buildHierarchy(
  containers: readonly ContainerRecord[],
  workUnits: readonly WorkUnitRecord[],
  ids: TokenResolver
): Hierarchy {
  const childContainers = groupByParent(containers);
  const childUnits = groupByParent(workUnits);

  const buildNode = (container: ContainerRecord): HierarchyNode => {
    const node: HierarchyNode = { id: ids.resolveToken(container.id, container.kind) };
    if (container.priority !== undefined) node.pri = container.priority;
    if (container.dueDate !== undefined) node.due = container.dueDate;

    const units = childUnits.get(container.id) ?? [];
    if (units.length > 0) {
      node.tasks = units.map((unit) => summarizeWorkUnit(unit, ids));
    }
    const children = childContainers.get(container.id) ?? [];
    if (children.length > 0) {
      node.sub = buildLevel(children);
    }
    return node;
  };

  const buildLevel = (level: readonly ContainerRecord[]): Hierarchy => {
    const tree: Hierarchy = new Map();
    for (const container of level) {
      tree.set(container.title, buildNode(container));
    }
    return tree;
  };

  const tree: Hierarchy = new Map();

  const inboxContainers = containers.filter((c) => c.parent.kind === "unassigned");
  const inboxUnits = workUnits.filter((u) => u.parent.kind === "unassigned");
  if (inboxContainers.length > 0 || inboxUnits.length > 0) {
    const inbox: HierarchyNode = { id: INBOX_TOKEN };
    if (inboxContainers.length > 0) inbox.sub = buildLevel(inboxContainers);
    if (inboxUnits.length > 0) inbox.tasks = inboxUnits.map((unit) => summarizeWorkUnit(unit, ids));
    tree.set(INBOX_TITLE, inbox);
  }

  for (const [title, node] of buildLevel(containers.filter((c) => c.parent.kind === "root"))) {
    tree.set(title, node);
  }
  return tree;
}
