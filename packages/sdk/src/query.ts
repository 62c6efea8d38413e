/**
 * Mango selector evaluation
 *
 * Covers the operators the task store's selectors use (field equality,
 * `$exists` and `$or`), so selectors can be checked in process against plain
 * documents.
 */

import type { Selector } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Get a nested value using dot-path notation
 */
export function getPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function matchField(val: unknown, cond: unknown): boolean {
  if (!isRecord(cond)) {
    return val === cond;
  }
  for (const [op, rhs] of Object.entries(cond)) {
    if (op !== "$exists") {
      throw new Error(`Unknown operator: ${op}`);
    }
    if ((val !== undefined) !== rhs) return false;
  }
  return true;
}

/**
 * Test whether a document satisfies a selector
 */
export function matches(doc: unknown, selector: Selector): boolean {
  for (const [key, value] of Object.entries(selector)) {
    if (key === "$or") {
      if (!Array.isArray(value)) {
        throw new Error("$or operator requires an array of selectors");
      }
      if (!value.filter(isRecord).some((part) => matches(doc, part))) return false;
      continue;
    }

    if (!matchField(getPath(doc, key), value)) {
      return false;
    }
  }

  return true;
}
