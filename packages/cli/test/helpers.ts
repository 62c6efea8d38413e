/**
 * In-process CLI runner for tests
 */

import type { TaskBridgeConfig } from "@taskbridge/sdk";
import { MemoryStore, openAdapter, sampleDocuments } from "@taskbridge/testkit";
import { run } from "../src/program.js";
import type { Output } from "../src/lib/render.js";

export const TEST_ENV: NodeJS.ProcessEnv = {
  DB_URL: "http://localhost:5984",
  DB_NAME: "tasks",
  DB_USERNAME: "test-user",
  DB_PASSWORD: "test-secret",
};

export class Capture implements Output {
  readonly chunks: string[] = [];
  isTTY = false;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }
}

export interface CliRun {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Configurations the CLI connected with */
  configs: TaskBridgeConfig[];
}

/**
 * Run the CLI against `store` (a fresh sample workspace by default)
 */
export async function runCli(
  args: string[],
  options: { store?: MemoryStore; env?: NodeJS.ProcessEnv } = {}
): Promise<CliRun> {
  const store = options.store ?? new MemoryStore(sampleDocuments());
  const stdout = new Capture();
  const stderr = new Capture();
  const configs: TaskBridgeConfig[] = [];

  const exitCode = await run(args, {
    env: options.env ?? TEST_ENV,
    stdout,
    stderr,
    connect: (config) => {
      configs.push(config);
      return openAdapter(store);
    },
  });

  return { exitCode, stdout: stdout.text, stderr: stderr.text, configs };
}
