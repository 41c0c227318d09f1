import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), "memory-config-"));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("defaults the database into the config directory", () => {
    expect(loadConfig({ MEMORY_CONFIG_DIR: configDir })).toEqual({
      configDir,
      sqlitePath: join(configDir, "memories.db"),
    });
  });

  it("reads sqlitePath from config.json", () => {
    writeFileSync(join(configDir, "config.json"), JSON.stringify({ sqlitePath: "/data/notes.db" }));

    expect(loadConfig({ MEMORY_CONFIG_DIR: configDir }).sqlitePath).toBe("/data/notes.db");
  });

  it("lets SQLITE_PATH override the config file", () => {
    writeFileSync(join(configDir, "config.json"), JSON.stringify({ sqlitePath: "/data/notes.db" }));

    const config = loadConfig({ MEMORY_CONFIG_DIR: configDir, SQLITE_PATH: "/tmp/override.db" });
    expect(config.sqlitePath).toBe("/tmp/override.db");
  });

  it("falls back to defaults when the file is malformed", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    writeFileSync(join(configDir, "config.json"), "{ not json");

    expect(loadConfig({ MEMORY_CONFIG_DIR: configDir }).sqlitePath).toBe(
      join(configDir, "memories.db")
    );
    expect(errorSpy).toHaveBeenCalledOnce();
  });

  it("ignores a config file with the wrong shape", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    writeFileSync(join(configDir, "config.json"), JSON.stringify({ sqlitePath: 42 }));

    expect(loadConfig({ MEMORY_CONFIG_DIR: configDir }).sqlitePath).toBe(
      join(configDir, "memories.db")
    );
    expect(errorSpy).toHaveBeenCalledOnce();
  });
});
