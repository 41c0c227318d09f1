/**
 * Configuration Management
 */

import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

// Load .env file if it exists
loadEnv();

export interface Config {
  configDir: string;
  sqlitePath: string;
}

const ConfigFileSchema = z.object({
  sqlitePath: z.string().min(1).optional(),
});

export const DEFAULT_CONFIG_DIR = join(homedir(), ".memory-manager");

function readConfigFile(configPath: string): z.infer<typeof ConfigFileSchema> {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const data: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    const parsed = ConfigFileSchema.safeParse(data);
    if (parsed.success) {
      return parsed.data;
    }
    console.error(`Ignoring invalid config at ${configPath}:`, parsed.error.message);
  } catch (error) {
    console.error("Error loading config, using defaults:", error);
  }
  return {};
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configDir = env.MEMORY_CONFIG_DIR || DEFAULT_CONFIG_DIR;
  const saved = readConfigFile(join(configDir, "config.json"));

  // Environment variables always override saved config
  return {
    configDir,
    sqlitePath: env.SQLITE_PATH || saved.sqlitePath || join(configDir, "memories.db"),
  };
}
