import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";
import { StoreError } from "./errors.js";

function sqliteFailure(sql: string): unknown {
  const db = new Database(":memory:");
  db.exec("CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT NOT NULL)");
  try {
    db.exec(sql);
  } catch (error) {
    return error;
  } finally {
    db.close();
  }
  return undefined;
}

describe("StoreError.from", () => {
  it("classifies constraint failures", () => {
    const error = StoreError.from(sqliteFailure("INSERT INTO notes (body) VALUES (NULL)"));

    expect(error.kind).toBe("constraint_violation");
    expect(error.message).toBe("NOT NULL constraint failed: notes.body");
  });

  it("classifies other engine failures as io_failure", () => {
    const cause = sqliteFailure("SELECT * FROM missing_table");
    const error = StoreError.from(cause);

    expect(error.kind).toBe("io_failure");
    expect(error.message).toBe("no such table: missing_table");
    expect(error.cause).toBe(cause);
  });

  it("returns an existing StoreError unchanged", () => {
    const original = new StoreError("constraint_violation", "duplicate");
    expect(StoreError.from(original)).toBe(original);
  });

  it("stringifies non-Error values", () => {
    expect(StoreError.from("disk full").message).toBe("disk full");
  });
});
