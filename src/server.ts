/**
 * MCP Server Setup
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { MemoryDatabase } from "./database.js";
import { invokeTool } from "./dispatcher.js";
import { errorResult } from "./format.js";
import { listToolDefinitions } from "./tools.js";

export const SERVER_NAME = "memory-manager";
export const SERVER_VERSION = "0.1.0";

export function createServer(memories: MemoryDatabase): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: listToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      return await invokeTool(memories, name, args);
    } catch (error) {
      // Not an argument or store error, so a bug: flag it but keep serving
      console.error(`Tool ${name} failed:`, error);
      return errorResult(error instanceof Error ? error.message : String(error));
    }
  });

  // Transport closed, by the client or by server.close(): release the
  // database. A later call through the same handle reopens it.
  server.onclose = () => {
    memories.close();
  };

  return server;
}
