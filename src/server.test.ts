import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryDatabase } from "./database.js";
import { invokeTool } from "./dispatcher.js";
import { createServer } from "./server.js";

describe("MCP server", () => {
  let memories: MemoryDatabase;
  let client: Client;

  beforeEach(async () => {
    memories = new MemoryDatabase(":memory:");
    const server = createServer(memories);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    memories.close();
  });

  it("advertises the five tools without opening the database", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "remember",
      "get_memory",
      "list_memories",
      "update_memory",
      "delete_memory",
    ]);
    expect(tools[3]?.inputSchema.required).toEqual(["memory_id"]);
    expect(memories.isOpen).toBe(false);
  });

  it("round-trips a memory through tool calls", async () => {
    const stored = await client.callTool({
      name: "remember",
      arguments: { title: "Meeting", content: "Thursday at 10" },
    });
    expect(stored.content).toEqual([
      { type: "text", text: "Memory stored successfully with ID: 1." },
    ]);

    const fetched = await client.callTool({
      name: "get_memory",
      arguments: { memory_id: 1 },
    });
    expect(fetched.content).toEqual([
      { type: "text", text: "Title: Meeting\n\nContent: Thursday at 10" },
    ]);
  });

  it("returns unknown tools as error results", async () => {
    const result = await client.callTool({ name: "bogus_tool", arguments: {} });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: "text", text: "Unknown tool: bogus_tool" }]);
  });

  describe("when the transport closes", () => {
    let tmpDir: string;
    let fileMemories: MemoryDatabase;
    let fileClient: Client;

    beforeEach(async () => {
      tmpDir = mkdtempSync(join(tmpdir(), "memory-server-"));
      fileMemories = new MemoryDatabase(join(tmpDir, "memories.db"));
      const server = createServer(fileMemories);
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

      fileClient = new Client({ name: "test-client", version: "1.0.0" });
      await Promise.all([server.connect(serverTransport), fileClient.connect(clientTransport)]);
    });

    afterEach(() => {
      fileMemories.close();
      rmSync(tmpDir, { recursive: true, force: true });
    });

    it("closes the database and reopens it on the next call", async () => {
      await fileClient.callTool({
        name: "remember",
        arguments: { title: "Kept", content: "across reconnects" },
      });
      expect(fileMemories.isOpen).toBe(true);

      await fileClient.close();
      expect(fileMemories.isOpen).toBe(false);

      const result = await invokeTool(fileMemories, "get_memory", { memory_id: 1 });
      expect(result.content).toEqual([
        { type: "text", text: "Title: Kept\n\nContent: across reconnects" },
      ]);
      expect(fileMemories.isOpen).toBe(true);
    });
  });
});
