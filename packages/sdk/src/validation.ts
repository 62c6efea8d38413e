/**
 * Input validation for titles, dates and priorities
 */

import { InvalidInputError } from "./errors.js";
import type { Priority, PriorityInput } from "./types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Require a non-blank title; surrounding whitespace is trimmed
 */
export function requireTitle(value: string | undefined, field = "title"): string {
  const title = value?.trim() ?? "";
  if (title.length === 0) {
    throw new InvalidInputError(field, `${field} is required`);
  }
  return title;
}

/**
 * Require a YYYY-MM-DD string naming a real calendar date
 */
export function validateDate(value: string, field = "date"): string {
  const trimmed = value.trim();
  const match = ISO_DATE.exec(trimmed);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day
    ) {
      return trimmed;
    }
  }
  throw new InvalidInputError(field, `Invalid ${field}: '${value}'. Use YYYY-MM-DD format.`);
}

export function isPriority(value: number): value is Priority {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Parse a caller-supplied priority
 * @throws InvalidInputError unless the value is 1, 2 or 3
 */
export function parsePriority(value: PriorityInput, field = "priority"): Priority {
  const numeric =
    typeof value === "number" ? value : /^\s*\d+\s*$/.test(value) ? Number(value) : Number.NaN;
  if (isPriority(numeric)) {
    return numeric;
  }
  throw new InvalidInputError(
    field,
    `Invalid priority value: ${String(value)}. Must be 1, 2, or 3 (with 3 being highest).`
  );
}

/**
 * Read a stored priority leniently; a bare `true` star counts as 1
 */
export function normalizePriority(value: unknown): Priority | undefined {
  if (value === true) {
    return 1;
  }
  if (typeof value === "number" && isPriority(value)) {
    return value;
  }
  if (typeof value === "string" && /^\s*[123]\s*$/.test(value)) {
    const numeric = Number(value);
    return isPriority(numeric) ? numeric : undefined;
  }
  return undefined;
}
