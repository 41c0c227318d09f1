/**
 * Handler: delete_memory
 *
 * Permanently delete a memory by ID
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { DeleteMemoryArgs, parseArguments, type ToolArguments } from "../arguments.js";
import type { MemoryDatabase } from "../database.js";
import { StoreError } from "../errors.js";
import { storeErrorResult, textResult } from "../format.js";
import { deleteMemory } from "../operations.js";

export async function handleDeleteMemory(
  memories: MemoryDatabase,
  args: ToolArguments
): Promise<CallToolResult> {
  const { memory_id } = parseArguments("delete_memory", DeleteMemoryArgs, args);

  try {
    if (!deleteMemory(memories, memory_id)) {
      return textResult(`Memory with ID ${memory_id} not found.`);
    }
    return textResult(`Memory ${memory_id} deleted successfully.`);
  } catch (error) {
    if (error instanceof StoreError) {
      return storeErrorResult("deleting memory", error);
    }
    throw error;
  }
}
