/**
 * Tests for the installed `taskbridge-server` command
 */

import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { isRecord } from "@taskbridge/sdk";

const packageUrl = new URL("../../../package.json", import.meta.url);

function binTarget(name: string): string {
  const manifest: unknown = JSON.parse(readFileSync(packageUrl, "utf-8"));
  if (!isRecord(manifest) || !isRecord(manifest.bin)) {
    throw new Error("package.json has no bin map");
  }
  const target = manifest.bin[name];
  if (typeof target !== "string") {
    throw new Error(`bin '${name}' is missing`);
  }
  return target;
}

describe("taskbridge-server bin", () => {
  it("should point at the server entry point", () => {
    expect(binTarget("taskbridge-server")).toBe("./src/main.ts");
  });

  it("should start through the TypeScript loader", () => {
    const source = readFileSync(new URL(binTarget("taskbridge-server"), packageUrl), "utf-8");
    expect(source.split("\n")[0]).toBe("#!/usr/bin/env tsx");
  });
});
