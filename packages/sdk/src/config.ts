/**
 * Environment configuration
 *
 * Connection settings are required; everything else has a default.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./observability/logs.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_FIND_LIMIT = 10_000;

function flag(fallback: boolean) {
  return z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));
}

const EnvSchema = z.object({
  DB_URL: z.string({ required_error: "missing" }).url("must be a URL"),
  DB_NAME: z.string({ required_error: "missing" }),
  DB_USERNAME: z.string({ required_error: "missing" }),
  DB_PASSWORD: z.string({ required_error: "missing" }),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  TASKBRIDGE_READONLY: flag(false),
  TASKBRIDGE_ENABLED: flag(true),
  TASKBRIDGE_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  TASKBRIDGE_FIND_LIMIT: z.coerce.number().int().positive().default(DEFAULT_FIND_LIMIT),
});

export interface StoreConnection {
  url: string;
  database: string;
  username: string;
  password: string;
  requestTimeoutMs: number;
  findLimit: number;
}

export interface TaskBridgeConfig {
  store: StoreConnection;
  logLevel: LogLevel;
  readOnly: boolean;
  enabled: boolean;
}

/** Values that take precedence over the environment, such as CLI flags */
export interface ConfigOverrides {
  url?: string;
  database?: string;
  username?: string;
  password?: string;
}

const OVERRIDE_KEYS: ReadonlyArray<[keyof ConfigOverrides, string]> = [
  ["url", "DB_URL"],
  ["database", "DB_NAME"],
  ["username", "DB_USERNAME"],
  ["password", "DB_PASSWORD"],
];

/**
 * Build the configuration from environment variables
 * Priority: override > environment > default; empty strings count as unset
 * @throws ConfigurationError listing every missing or malformed setting
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): TaskBridgeConfig {
  const source: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      source[key] = value;
    }
  }
  for (const [key, envKey] of OVERRIDE_KEYS) {
    const value = overrides[key];
    if (value !== undefined && value !== "") {
      source[envKey] = value;
    }
  }

  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    store: {
      url: parsed.DB_URL,
      database: parsed.DB_NAME,
      username: parsed.DB_USERNAME,
      password: parsed.DB_PASSWORD,
      requestTimeoutMs: parsed.TASKBRIDGE_REQUEST_TIMEOUT_MS,
      findLimit: parsed.TASKBRIDGE_FIND_LIMIT,
    },
    logLevel: parsed.LOG_LEVEL,
    readOnly: parsed.TASKBRIDGE_READONLY,
    enabled: parsed.TASKBRIDGE_ENABLED,
  };
}
