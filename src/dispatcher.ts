/**
 * Tool dispatch
 *
 * Maps a tool name and its raw arguments to a handler. Malformed calls come
 * back with isError set; everything else, including store failures, is a
 * normal text result.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolArguments } from "./arguments.js";
import type { MemoryDatabase } from "./database.js";
import { ToolArgumentError } from "./errors.js";
import { errorResult } from "./format.js";
import { handleDeleteMemory } from "./handlers/delete-memory.js";
import { handleGetMemory } from "./handlers/get-memory.js";
import { handleListMemories } from "./handlers/list-memories.js";
import { handleRemember } from "./handlers/remember.js";
import { handleUpdateMemory } from "./handlers/update-memory.js";
import { isToolName, type ToolName } from "./tools.js";

type ToolHandler = (
  memories: MemoryDatabase,
  args: ToolArguments | undefined
) => Promise<CallToolResult>;

const handlers: Record<ToolName, ToolHandler> = {
  remember: (memories, args) => handleRemember(memories, args ?? {}),
  get_memory: (memories, args) => {
    if (!args) {
      throw new ToolArgumentError("Arguments are required for get_memory");
    }
    return handleGetMemory(memories, args);
  },
  list_memories: (memories) => handleListMemories(memories),
  update_memory: (memories, args) => handleUpdateMemory(memories, args ?? {}),
  delete_memory: (memories, args) => handleDeleteMemory(memories, args ?? {}),
};

export async function invokeTool(
  memories: MemoryDatabase,
  name: string,
  args: ToolArguments | undefined
): Promise<CallToolResult> {
  try {
    if (!isToolName(name)) {
      throw new ToolArgumentError(`Unknown tool: ${name}`);
    }
    return await handlers[name](memories, args);
  } catch (error) {
    if (error instanceof ToolArgumentError) {
      return errorResult(error.message);
    }
    throw error;
  }
}
