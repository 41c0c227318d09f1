/**
 * Handler: list_memories
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { MemoryDatabase } from "../database.js";
import { StoreError } from "../errors.js";
import { formatMemoryList, storeErrorResult, textResult } from "../format.js";
import { listMemories } from "../operations.js";

export async function handleListMemories(memories: MemoryDatabase): Promise<CallToolResult> {
  try {
    return textResult(formatMemoryList(listMemories(memories)));
  } catch (error) {
    if (error instanceof StoreError) {
      return storeErrorResult("listing memories", error);
    }
    throw error;
  }
}
