#!/usr/bin/env tsx

/**
 * TaskBridge CLI entry point
 */

import { run } from "./program.js";

run(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
