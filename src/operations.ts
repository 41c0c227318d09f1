/**
 * Database Operations
 *
 * CRUD operations for memories. Every function takes the database handle
 * explicitly; "not found" is reported through the return value and engine
 * failures surface as StoreError.
 */

import type { MemoryDatabase } from "./database.js";
import { StoreError } from "./errors.js";
import type { MemoryPatch, MemoryRecord, MemorySummary } from "./types.js";

interface MemoryRow {
  id: number;
  title: string;
  content: string;
  created_at: number;
  updated_at: number;
}

const SELECT_COLUMNS = "id, title, content, created_at, updated_at";

const UPDATE_TITLE = `
  UPDATE memories SET title = @title, updated_at = @updatedAt WHERE id = @id
`;
const UPDATE_CONTENT = `
  UPDATE memories SET content = @content, updated_at = @updatedAt WHERE id = @id
`;
const UPDATE_TITLE_AND_CONTENT = `
  UPDATE memories SET title = @title, content = @content, updated_at = @updatedAt WHERE id = @id
`;

function toRecord(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function guard<T>(operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    throw StoreError.from(error);
  }
}

/**
 * Store a new memory and return its id
 */
export function addMemory(memories: MemoryDatabase, title: string, content: string): number {
  return guard(() => {
    const now = Date.now();
    const stmt = memories.connection().prepare<[string, string, number, number]>(`
      INSERT INTO memories (title, content, created_at, updated_at)
      VALUES (?, ?, ?, ?)
    `);
    const result = stmt.run(title, content, now, now);
    return Number(result.lastInsertRowid);
  });
}

/**
 * Get a memory by ID
 */
export function getMemoryById(memories: MemoryDatabase, id: number): MemoryRecord | null {
  return guard(() => {
    const row = memories
      .connection()
      .prepare<[number], MemoryRow>(`SELECT ${SELECT_COLUMNS} FROM memories WHERE id = ?`)
      .get(id);
    return row ? toRecord(row) : null;
  });
}

/**
 * Get a memory by exact title. Titles are not unique; the lowest id wins.
 */
export function getMemoryByTitle(memories: MemoryDatabase, title: string): MemoryRecord | null {
  return guard(() => {
    const row = memories
      .connection()
      .prepare<[string], MemoryRow>(
        `SELECT ${SELECT_COLUMNS} FROM memories WHERE title = ? ORDER BY id ASC LIMIT 1`
      )
      .get(title);
    return row ? toRecord(row) : null;
  });
}

/**
 * List id and title of every memory in insertion order
 */
export function listMemories(memories: MemoryDatabase): MemorySummary[] {
  return guard(() =>
    memories
      .connection()
      .prepare<[], MemorySummary>("SELECT id, title FROM memories ORDER BY id ASC")
      .all()
  );
}

/**
 * Apply a partial update. Returns false when the memory does not exist.
 * An empty patch leaves the row untouched, updated_at included.
 */
export function updateMemory(memories: MemoryDatabase, id: number, patch: MemoryPatch): boolean {
  return guard(() => {
    const db = memories.connection();
    const { title, content } = patch;
    const updatedAt = Date.now();

    let changes: number;
    if (title !== undefined && content !== undefined) {
      changes = db.prepare(UPDATE_TITLE_AND_CONTENT).run({ id, title, content, updatedAt }).changes;
    } else if (title !== undefined) {
      changes = db.prepare(UPDATE_TITLE).run({ id, title, updatedAt }).changes;
    } else if (content !== undefined) {
      changes = db.prepare(UPDATE_CONTENT).run({ id, content, updatedAt }).changes;
    } else {
      const row = db.prepare<[number]>("SELECT 1 FROM memories WHERE id = ?").get(id);
      return row !== undefined;
    }

    return changes > 0;
  });
}

/**
 * Permanently delete a memory
 */
export function deleteMemory(memories: MemoryDatabase, id: number): boolean {
  return guard(() => {
    const result = memories
      .connection()
      .prepare<[number]>("DELETE FROM memories WHERE id = ?")
      .run(id);
    return result.changes > 0;
  });
}
