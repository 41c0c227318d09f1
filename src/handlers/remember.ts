/**
 * Handler: remember
 *
 * Store a new memory
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { RememberArgs, parseArguments, type ToolArguments } from "../arguments.js";
import type { MemoryDatabase } from "../database.js";
import { StoreError } from "../errors.js";
import { storeErrorResult, textResult } from "../format.js";
import { addMemory } from "../operations.js";

export async function handleRemember(
  memories: MemoryDatabase,
  args: ToolArguments
): Promise<CallToolResult> {
  const { title, content } = parseArguments("remember", RememberArgs, args);

  try {
    const id = addMemory(memories, title, content);
    return textResult(`Memory stored successfully with ID: ${id}.`);
  } catch (error) {
    if (error instanceof StoreError) {
      return storeErrorResult("storing memory", error);
    }
    throw error;
  }
}
