/**
 * Response Formatting Utilities
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { StoreError } from "./errors.js";
import type { MemoryRecord, MemorySummary } from "./types.js";

export type StoreAction =
  | "storing memory"
  | "retrieving memory"
  | "listing memories"
  | "updating memory"
  | "deleting memory";

export function textResult(text: string): CallToolResult {
  return {
    content: [{ type: "text", text }],
  };
}

/**
 * Failed tool call: the client sees isError set
 */
export function errorResult(text: string): CallToolResult {
  return {
    content: [{ type: "text", text }],
    isError: true,
  };
}

/**
 * Store failures are reported as ordinary text so the call still succeeds
 */
export function storeErrorResult(action: StoreAction, error: StoreError): CallToolResult {
  return textResult(`Error ${action}: ${error.message}`);
}

export function formatMemory(memory: MemoryRecord): string {
  return `Title: ${memory.title}\n\nContent: ${memory.content}`;
}

export function formatMemoryList(memories: MemorySummary[]): string {
  if (memories.length === 0) {
    return "No memories stored yet.";
  }

  let text = "Stored Memories:\n\n";
  for (const memory of memories) {
    text += `ID: ${memory.id} - ${memory.title}\n`;
  }
  return text;
}
