/**
 * MCP protocol wiring for the task tools
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { logger as defaultLogger, type Logger } from "@taskbridge/sdk";
import { isToolName, READ_ONLY_TOOLS, type ToolSet } from "./tools.js";

export const SERVER_NAME = "taskbridge";
export const SERVER_VERSION = "0.1.0";

export interface McpServerOptions {
  /** Advertise and permit only the read-only tools */
  readOnly?: boolean;
  logger?: Logger;
}

export function createMcpServer(tools: ToolSet, options: McpServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;
  const log = options.logger ?? defaultLogger;

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  const visible = readOnly
    ? tools.definitions.filter((tool) => READ_ONLY_TOOLS.has(tool.name))
    : tools.definitions;

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: visible }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (!isToolName(name)) {
      log.warn("server.tool.unknown", { tool: name });
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
    if (readOnly && !READ_ONLY_TOOLS.has(name)) {
      log.warn("server.tool.denied", { tool: name, mode: "readonly" });
      throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
    }

    return tools.handlers[name](args);
  });

  return server;
}
