/**
 * Type Definitions
 */

export interface MemoryRecord {
  id: number;
  title: string;
  content: string;
  createdAt: number;
  updatedAt: number;
}

/** Lightweight projection returned by list_memories */
export interface MemorySummary {
  id: number;
  title: string;
}

/**
 * Partial update for a memory. Omitted fields are left untouched.
 */
export interface MemoryPatch {
  title?: string;
  content?: string;
}
