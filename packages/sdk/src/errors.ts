/**
 * Error types for TaskBridge operations
 *
 * Invariants:
 * - Every error carries a stable `code` for programmatic handling
 * - Underlying failures are preserved through `cause`
 */

import type { Namespace } from "./types.js";

export type ErrorCode = "E_CONFIG" | "E_TOKEN" | "E_INPUT" | "E_STORE";

/**
 * Base class for all TaskBridge errors
 */
export abstract class TaskBridgeError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when required connection settings are missing or malformed
 */
export class ConfigurationError extends TaskBridgeError {
  readonly code = "E_CONFIG";

  constructor(
    readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid configuration: ${issues.join("; ")}`, options);
  }
}

const TOKEN_HINTS: Record<Namespace | "parent", string> = {
  task: "Use a task ID (t1, t2, ...) from list_tasks results.",
  project: "Use a project ID (p1, p2, ...) from list_tasks results.",
  category: "Use a category ID (c1, c2, ...) from list_tasks results.",
  parent: "Use a project (p1, p2, ...) or category (c1, c2, ...) ID from list_tasks results.",
};

/**
 * Thrown when a friendly ID is unknown, malformed, or from the wrong namespace
 */
export class InvalidTokenError extends TaskBridgeError {
  readonly code = "E_TOKEN";

  constructor(
    readonly token: string,
    readonly expected?: Namespace | "parent",
    options?: ErrorOptions
  ) {
    const label = expected ?? "friendly";
    const hint = expected ? ` ${TOKEN_HINTS[expected]}` : "";
    super(`Invalid ${label} ID: '${token}'.${hint}`, options);
  }
}

/**
 * Thrown when user-supplied input fails validation
 */
export class InvalidInputError extends TaskBridgeError {
  readonly code = "E_INPUT";

  constructor(
    readonly field: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when the remote store cannot be reached or answers with an error
 */
export class StoreError extends TaskBridgeError {
  readonly code = "E_STORE";
  readonly operation: string;
  readonly status?: number;

  constructor(
    operation: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(`Store ${operation} failed: ${message}`, { cause: options?.cause });
    this.operation = operation;
    this.status = options?.status;
  }
}

/**
 * Reduce any thrown value to the `{ code, message }` shape surfaced to callers
 */
export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof TaskBridgeError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "E_INTERNAL", message: error.message };
  }
  return { code: "E_INTERNAL", message: String(error) };
}
