/**
 * Handler: get_memory
 *
 * Retrieve a specific memory by its ID or, failing that, by its title
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { GetMemoryArgs, parseArguments, type ToolArguments } from "../arguments.js";
import type { MemoryDatabase } from "../database.js";
import { StoreError } from "../errors.js";
import { formatMemory, storeErrorResult, textResult } from "../format.js";
import { getMemoryById, getMemoryByTitle } from "../operations.js";
import type { MemoryRecord } from "../types.js";

export async function handleGetMemory(
  memories: MemoryDatabase,
  args: ToolArguments
): Promise<CallToolResult> {
  const { memory_id, title } = parseArguments("get_memory", GetMemoryArgs, args);

  try {
    let memory: MemoryRecord | null;
    if (memory_id !== undefined) {
      memory = getMemoryById(memories, memory_id);
    } else if (title !== undefined) {
      memory = getMemoryByTitle(memories, title);
    } else {
      return textResult("Error: Please provide either a memory_id or title.");
    }

    return textResult(memory ? formatMemory(memory) : "Memory not found.");
  } catch (error) {
    if (error instanceof StoreError) {
      return storeErrorResult("retrieving memory", error);
    }
    throw error;
  }
}
