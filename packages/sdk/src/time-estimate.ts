/**
 * Conversion between millisecond estimates and short human strings
 */

import { InvalidInputError } from "./errors.js";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const TENTH_HOUR_MS = HOUR_MS / 10;

const PART = /^(\d+(?:\.\d*)?|\.\d+)([hm]?)$/i;

/**
 * Render milliseconds as "45m", "2h" or "1.5h"
 *
 * Absent, zero and negative values render as nothing. Under an hour the
 * minutes are floored, so anything below a minute reads "0m".
 */
export function formatTimeEstimate(ms: number | null | undefined): string | undefined {
  if (ms === null || ms === undefined || !Number.isFinite(ms) || ms <= 0) {
    return undefined;
  }
  if (ms < HOUR_MS) {
    return `${Math.floor(ms / MINUTE_MS)}m`;
  }
  if (ms % HOUR_MS === 0) {
    return `${ms / HOUR_MS}h`;
  }
  const tenths = roundHalfEven(ms / TENTH_HOUR_MS);
  return `${Math.floor(tenths / 10)}.${tenths % 10}h`;
}

// 1.25h reads "1.2h" and 1.35h reads "1.4h"
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Parse "30m", "1.5h", "1h 30m" or a bare number of minutes into milliseconds
 * @throws InvalidInputError when any part is unreadable or the total is not positive
 */
export function parseTimeEstimate(input: string): number {
  const parts = input.trim().split(/\s+/).filter((part) => part.length > 0);
  let minutes = 0;

  for (const part of parts) {
    const match = PART.exec(part);
    if (!match) {
      throw invalidEstimate(input);
    }
    const magnitude = Number(match[1]);
    minutes += match[2]?.toLowerCase() === "h" ? magnitude * 60 : magnitude;
  }

  if (!(minutes > 0)) {
    throw invalidEstimate(input);
  }
  return Math.trunc(minutes * MINUTE_MS);
}

function invalidEstimate(input: string): InvalidInputError {
  return new InvalidInputError(
    "timeEstimate",
    `Invalid time estimate format: '${input}'. Use formats like '30m', '1.5h', or '1h 30m'.`
  );
}
