/**
 * Option and argument parsers
 *
 * Each parser runs the SDK's own validation so the CLI rejects exactly what
 * the adapter would. An empty value passes through untouched: on `update`
 * it clears the field.
 */

import { InvalidArgumentError } from "commander";
import {
  InvalidInputError,
  parsePriority,
  parseTimeEstimate,
  validateDate,
  type Priority,
} from "@taskbridge/sdk";

function asArgumentError<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof InvalidInputError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

export function parseDateOption(value: string): string {
  return value.trim() === "" ? value : asArgumentError(() => validateDate(value, "dueDate"));
}

export function parseDayArgument(value: string): string {
  return asArgumentError(() => validateDate(value, "day"));
}

/**
 * Validate an estimate but keep the caller's text, which is echoed back
 */
export function parseEstimateOption(value: string): string {
  if (value.trim() === "") {
    return value;
  }
  asArgumentError(() => parseTimeEstimate(value));
  return value.trim();
}

export function parsePriorityOption(value: string): Priority | "" {
  return value.trim() === "" ? "" : asArgumentError(() => parsePriority(value));
}

/**
 * Friendly IDs are short tokens such as t1, p2 or c3
 */
export function parseFriendlyId(value: string): string {
  const trimmed = value.trim();
  if (!/^[tpc]\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`'${value}' is not a friendly ID (t1, p2, c3, ...)`);
  }
  return trimmed;
}
