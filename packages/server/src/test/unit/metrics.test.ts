/**
 * Unit tests for the metrics registry
 */

import { describe, it, expect } from "vitest";
import { MetricsRegistry, recordToolExecution } from "../../observability/metrics.js";

describe("MetricsRegistry", () => {
  it("should count per label set regardless of label order", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls", { tool: "list_tasks", mode: "readonly" });
    registry.inc("calls", { mode: "readonly", tool: "list_tasks" });
    registry.inc("calls", { tool: "create_task", mode: "readonly" });

    expect(registry.getCounter("calls", { tool: "list_tasks", mode: "readonly" })).toBe(2);
    expect(registry.getCounter("calls")).toBe(0);
  });

  it("should summarize latencies with percentiles", () => {
    const registry = new MetricsRegistry();
    for (let value = 1; value <= 100; value++) {
      registry.observe("latency", value);
    }

    expect(registry.getHistogram("latency")).toEqual({
      count: 100,
      sum: 5050,
      p50: 50,
      p95: 95,
      p99: 99,
    });
    expect(registry.getHistogram("missing")).toBeNull();
  });

  it("should keep only the most recent observations", () => {
    const registry = new MetricsRegistry();
    registry.observe("latency", 500);
    for (let i = 0; i < 1000; i++) {
      registry.observe("latency", 1);
    }

    expect(registry.getHistogram("latency")).toMatchObject({ count: 1000, sum: 1000, p99: 1 });
  });

  it("should reset every series", () => {
    const registry = new MetricsRegistry();
    registry.inc("calls");
    registry.observe("latency", 3);
    registry.reset();

    expect(registry.snapshot()).toEqual({ counters: {}, histograms: {} });
  });
});

describe("recordToolExecution", () => {
  it("should record calls, errors and latency", () => {
    const registry = new MetricsRegistry();
    recordToolExecution(registry, "create_task", 12);
    recordToolExecution(registry, "create_task", 8, "E_INPUT");

    expect(registry.snapshot()).toEqual({
      counters: {
        'taskbridge.tool.calls_total{tool="create_task"}': 2,
        'taskbridge.tool.errors_total{err_code="E_INPUT",tool="create_task"}': 1,
      },
      histograms: {
        'taskbridge.tool.latency_ms{tool="create_task"}': { count: 2, sum: 20, p50: 8, p95: 12, p99: 12 },
      },
    });
  });
});
