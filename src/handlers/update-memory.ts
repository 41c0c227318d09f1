/**
 * Handler: update_memory
 *
 * Update the title and/or content of an existing memory. Fields that are
 * not supplied keep their current value; a call with neither field reports
 * the unknown id first, then asks for a field.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { UpdateMemoryArgs, parseArguments, type ToolArguments } from "../arguments.js";
import type { MemoryDatabase } from "../database.js";
import { StoreError } from "../errors.js";
import { storeErrorResult, textResult } from "../format.js";
import { updateMemory } from "../operations.js";

export async function handleUpdateMemory(
  memories: MemoryDatabase,
  args: ToolArguments
): Promise<CallToolResult> {
  const { memory_id, title, content } = parseArguments("update_memory", UpdateMemoryArgs, args);

  try {
    // An empty patch only checks that the memory exists
    const updated = updateMemory(memories, memory_id, { title, content });
    if (!updated) {
      return textResult(`Memory with ID ${memory_id} not found.`);
    }
    if (title === undefined && content === undefined) {
      return textResult("Error: Please provide at least one field to update (title or content).");
    }
    return textResult(`Memory ${memory_id} updated successfully.`);
  } catch (error) {
    if (error instanceof StoreError) {
      return storeErrorResult("updating memory", error);
    }
    throw error;
  }
}
