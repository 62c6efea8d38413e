/**
 * TaskBridge MCP server
 */

export { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./mcp.js";
export type { McpServerOptions } from "./mcp.js";
export { startServer, redirectConsoleToStderr } from "./server.js";
export type { StartServerOptions, RunningServer } from "./server.js";
export {
  createTools,
  toolDefinitions,
  toToolError,
  isToolName,
  ToolTimeoutError,
  TOOL_NAMES,
  READ_ONLY_TOOLS,
  DEFAULT_TOOL_TIMEOUT_MS,
} from "./tools.js";
export type { ToolName, ToolHandler, ToolSet, ToolOptions } from "./tools.js";
export { MetricsRegistry, metrics, recordToolExecution } from "./observability/metrics.js";
export type { HistogramSummary } from "./observability/metrics.js";
export * from "./schemas.js";
