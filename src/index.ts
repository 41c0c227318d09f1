#!/usr/bin/env node

/**
 * Memory Manager MCP Server
 *
 * Stores titled memories in SQLite and serves them to MCP clients on stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { MemoryDatabase } from "./database.js";
import { createServer, SERVER_VERSION } from "./server.js";

async function main() {
  const config = loadConfig();

  // Open eagerly so a bad database path aborts startup
  const memories = new MemoryDatabase(config.sqlitePath);
  memories.init();

  const server = createServer(memories);

  let stopping = false;
  const stop = (reason: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.error(`Shutting down (${reason})`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Error during shutdown:", error);
        memories.close();
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  // The stdio transport does not notice the client going away
  process.stdin.once("end", () => stop("stdin closed"));

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
  console.error(`Memory Manager MCP Server v${SERVER_VERSION} running on stdio`);
  console.error(`Database: ${config.sqlitePath}`);
  console.error("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
