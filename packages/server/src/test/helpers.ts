/**
 * Shared helpers for server tests
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export const TEST_ENV: NodeJS.ProcessEnv = {
  DB_URL: "http://localhost:5984",
  DB_NAME: "tasks",
  DB_USERNAME: "test-user",
  DB_PASSWORD: "test-secret",
};

/**
 * Text of the single text item a tool returns
 */
export function textOf(result: CallToolResult): string {
  const first = result.content[0];
  if (result.content.length !== 1 || first?.type !== "text") {
    throw new Error(`Expected one text item, got ${JSON.stringify(result.content)}`);
  }
  return first.text;
}

export function jsonOf(result: CallToolResult): unknown {
  return JSON.parse(textOf(result));
}
