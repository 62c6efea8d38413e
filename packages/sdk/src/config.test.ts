/**
 * Tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const baseEnv = {
  DB_URL: "http://localhost:5984",
  DB_NAME: "tasks",
  DB_USERNAME: "test-user",
  DB_PASSWORD: "test-secret",
};

describe("loadConfig", () => {
  it("should read connection settings and apply defaults", () => {
    expect(loadConfig(baseEnv)).toEqual({
      store: {
        url: "http://localhost:5984",
        database: "tasks",
        username: "test-user",
        password: "test-secret",
        requestTimeoutMs: 30000,
        findLimit: 10000,
      },
      logLevel: "info",
      readOnly: false,
      enabled: true,
    });
  });

  it("should list every missing connection setting", () => {
    try {
      loadConfig({});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.code).toBe("E_CONFIG");
        expect(err.issues).toEqual([
          "DB_URL: missing",
          "DB_NAME: missing",
          "DB_USERNAME: missing",
          "DB_PASSWORD: missing",
        ]);
      }
    }
  });

  it("should treat empty strings as unset", () => {
    expect(() => loadConfig({ ...baseEnv, DB_PASSWORD: "" })).toThrow(
      "Invalid configuration: DB_PASSWORD: missing"
    );
  });

  it("should reject a malformed URL", () => {
    expect(() => loadConfig({ ...baseEnv, DB_URL: "localhost" })).toThrow(
      "Invalid configuration: DB_URL: must be a URL"
    );
  });

  it("should parse flags and numbers", () => {
    const config = loadConfig({
      ...baseEnv,
      LOG_LEVEL: "debug",
      TASKBRIDGE_READONLY: "1",
      TASKBRIDGE_ENABLED: "false",
      TASKBRIDGE_REQUEST_TIMEOUT_MS: "5000",
      TASKBRIDGE_FIND_LIMIT: "200",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.readOnly).toBe(true);
    expect(config.enabled).toBe(false);
    expect(config.store.requestTimeoutMs).toBe(5000);
    expect(config.store.findLimit).toBe(200);
  });

  it("should reject unreadable optional values", () => {
    expect(() => loadConfig({ ...baseEnv, TASKBRIDGE_READONLY: "maybe" })).toThrow(
      /TASKBRIDGE_READONLY/
    );
    expect(() => loadConfig({ ...baseEnv, TASKBRIDGE_FIND_LIMIT: "-1" })).toThrow(
      /TASKBRIDGE_FIND_LIMIT/
    );
    expect(() => loadConfig({ ...baseEnv, LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });

  it("should let overrides win over the environment", () => {
    const config = loadConfig(baseEnv, { url: "http://other:5984", database: "", username: "cli-user" });

    expect(config.store.url).toBe("http://other:5984");
    expect(config.store.database).toBe("tasks");
    expect(config.store.username).toBe("cli-user");
  });
});
