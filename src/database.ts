/**
 * Database Setup and Schema
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export type DB = Database.Database;

export interface MemoryDatabaseOptions {
  /** Opens a raw connection; defaults to better-sqlite3 on the given path */
  open?: (path: string) => DB;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS memories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
`;

/**
 * Handle owning the single SQLite connection.
 *
 * The connection is opened on first use and reopened on the next call after
 * `close()`, so a closed handle stays usable.
 */
export class MemoryDatabase {
  readonly path: string;
  private readonly open: (path: string) => DB;
  private db: DB | null = null;

  constructor(path: string, options: MemoryDatabaseOptions = {}) {
    this.path = path;
    this.open = options.open ?? ((file) => new Database(file));
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Open the connection now instead of on first use. Throws if the file
   * cannot be opened.
   */
  init(): void {
    this.connection();
  }

  connection(): DB {
    if (this.db) {
      return this.db;
    }

    if (this.path !== ":memory:") {
      const dbDir = dirname(this.path);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    const db = this.open(this.path);
    try {
      db.pragma("journal_mode = WAL");
      db.exec(SCHEMA);
    } catch (error) {
      db.close();
      throw error;
    }

    this.db = db;
    return db;
  }

  close(): void {
    if (!this.db) {
      return;
    }
    const db = this.db;
    this.db = null;
    db.close();
  }
}
