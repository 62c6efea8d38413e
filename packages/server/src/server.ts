/**
 * Server bootstrap: configuration, store connection and transport
 *
 * All logging goes to stderr; stdout is reserved for protocol frames.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  loadConfig,
  Logger,
  TaskAdapter,
  type TaskAdapterOptions,
  type TaskBridgeConfig,
} from "@taskbridge/sdk";
import { createMcpServer } from "./mcp.js";
import { metrics as defaultMetrics, type MetricsRegistry } from "./observability/metrics.js";
import { createTools } from "./tools.js";

export interface StartServerOptions {
  env?: NodeJS.ProcessEnv;
  /** Defaults to stdio */
  transport?: Transport;
  logger?: Logger;
  metrics?: MetricsRegistry;
  /** Opens the adapter; defaults to connecting to the configured store */
  connect?: (config: TaskBridgeConfig, options: TaskAdapterOptions) => Promise<TaskAdapter>;
}

export interface RunningServer {
  server: Server;
  config: TaskBridgeConfig;
  close(): Promise<void>;
}

/**
 * Stray console output on stdout would corrupt the protocol stream
 */
export function redirectConsoleToStderr(): void {
  const redirect =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirect("console.log");
  console.info = redirect("console.info");
  console.debug = redirect("console.debug");
}

/**
 * Load configuration and serve the tools
 *
 * Resolves to `null` when the server is disabled by configuration.
 * @throws ConfigurationError when connection settings are missing
 */
export async function startServer(options: StartServerOptions = {}): Promise<RunningServer | null> {
  const config = loadConfig(options.env ?? process.env);
  const log = options.logger ?? new Logger(config.logLevel);

  if (!config.enabled) {
    log.info("server.disabled", { reason: "TASKBRIDGE_ENABLED=false" });
    return null;
  }

  const connect = options.connect ?? TaskAdapter.connect;
  const adapter = await connect(config, { logger: log });
  const tools = createTools(adapter, { logger: log, metrics: options.metrics ?? defaultMetrics });
  const server = createMcpServer(tools, { readOnly: config.readOnly, logger: log });

  const transport = options.transport ?? new StdioServerTransport();
  await server.connect(transport);

  log.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    database: config.store.database,
  });

  return {
    server,
    config,
    close: async () => {
      log.info("server.shutdown", {});
      await server.close();
    },
  };
}
