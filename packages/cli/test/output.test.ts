/**
 * Unit tests for rendering and telemetry helpers
 */

import { describe, it, expect, vi } from "vitest";
import { colorize, printJson, printText } from "../src/lib/render.js";
import { emitMetric, withTiming } from "../src/lib/telemetry.js";
import { Capture } from "./helpers.js";

describe("render", () => {
  it("should print pretty or raw JSON", () => {
    const out = new Capture();
    printJson(out, { ok: true });
    printJson(out, { ok: true }, { raw: true });
    expect(out.text).toBe('{\n  "ok": true\n}\n{"ok":true}\n');
  });

  it("should end text with exactly one newline", () => {
    const out = new Capture();
    printText(out, "one");
    printText(out, "two\n");
    expect(out.text).toBe("one\ntwo\n");
  });

  it("should only color TTY streams", () => {
    const plain = new Capture();
    const tty = new Capture();
    tty.isTTY = true;

    expect(colorize("oops", "red", plain)).toBe("oops");
    expect(colorize("oops", "red", tty)).toBe("\x1b[31moops\x1b[0m");
  });
});

describe("telemetry", () => {
  it("should stay quiet unless verbose", () => {
    const stderr = new Capture();
    emitMetric({ verbose: false, stderr }, "cli.list", { duration_ms: 5 });
    expect(stderr.text).toBe("");
  });

  it("should flatten newlines in metric fields", () => {
    const stderr = new Capture();
    emitMetric({ verbose: true, stderr }, "cli.list", { duration_ms: 5, note: "a\nb" });
    expect(stderr.text).toBe("metric cli.list duration_ms=5 note=a b\n");
  });

  it("should time failures and rethrow", async () => {
    const stderr = new Capture();
    vi.spyOn(Date, "now").mockReturnValueOnce(1000).mockReturnValueOnce(1042);

    await expect(
      withTiming({ verbose: true, stderr }, "cli.update", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(stderr.text).toBe("metric cli.update duration_ms=42 success=false\n");
  });
});
