/**
 * Tool Definitions
 *
 * Static descriptors advertised through tools/list. Nothing here reads the
 * database.
 */

export const TOOL_NAMES = [
  "remember",
  "get_memory",
  "list_memories",
  "update_memory",
  "delete_memory",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

interface PropertySchema {
  type: "string" | "integer";
  description: string;
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, PropertySchema>;
    required?: string[];
    title: string;
  };
}

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

export function listToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "remember",
      description: "Store a new memory.",
      inputSchema: {
        type: "object",
        properties: {
          title: {
            type: "string",
            description: "A concise title for the memory",
          },
          content: {
            type: "string",
            description: "The full content of the memory to store",
          },
        },
        required: ["title", "content"],
        title: "rememberArguments",
      },
    },
    {
      name: "get_memory",
      description: "Retrieve a specific memory by ID or title.",
      inputSchema: {
        type: "object",
        properties: {
          memory_id: {
            type: "integer",
            description: "The ID of the memory to retrieve",
          },
          title: {
            type: "string",
            description: "The title of the memory to retrieve",
          },
        },
        title: "getMemoryArguments",
      },
    },
    {
      name: "list_memories",
      description: "List all stored memories.",
      inputSchema: {
        type: "object",
        properties: {},
        title: "listMemoriesArguments",
      },
    },
    {
      name: "update_memory",
      description: "Update an existing memory.",
      inputSchema: {
        type: "object",
        properties: {
          memory_id: {
            type: "integer",
            description: "The ID of the memory to update",
          },
          title: {
            type: "string",
            description: "Optional new title for the memory",
          },
          content: {
            type: "string",
            description: "Optional new content for the memory",
          },
        },
        required: ["memory_id"],
        title: "updateMemoryArguments",
      },
    },
    {
      name: "delete_memory",
      description: "Delete a memory.",
      inputSchema: {
        type: "object",
        properties: {
          memory_id: {
            type: "integer",
            description: "The ID of the memory to delete",
          },
        },
        required: ["memory_id"],
        title: "deleteMemoryArguments",
      },
    },
  ];
}
