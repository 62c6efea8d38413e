/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { TaskBridgeError } from "@taskbridge/sdk";

/**
 * Process exit codes
 * - 0: success
 * - 1: unexpected failure
 * - 2: usage, invalid input or unknown friendly ID
 * - 3: configuration missing or invalid
 * - 4: store unreachable or failing
 */
export const EXIT = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  CONFIG: 3,
  STORE: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/**
 * Error raised by a command itself, carrying its exit code
 */
export class CliError extends Error {
  exitCode: ExitCode;

  constructor(message: string, options?: { exitCode?: ExitCode; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT.FAILURE;
  }
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT.OK : EXIT.USAGE;
  }

  if (error instanceof TaskBridgeError) {
    switch (error.code) {
      case "E_INPUT":
      case "E_TOKEN":
        return EXIT.USAGE;
      case "E_CONFIG":
        return EXIT.CONFIG;
      case "E_STORE":
        return EXIT.STORE;
    }
  }

  return EXIT.FAILURE;
}

const MAX_MESSAGE_LENGTH = 2000;

/**
 * Format an error for stderr
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let message = error.message;
  if (message.length > MAX_MESSAGE_LENGTH) {
    message = message.substring(0, MAX_MESSAGE_LENGTH) + "... (truncated)";
  }

  if (verbose && error.cause !== undefined) {
    message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
  }

  if (verbose && error.stack) {
    message += `\n${error.stack}`;
  }

  return message;
}
