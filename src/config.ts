import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { IN_MEMORY } from "./migrations/runner";
import { type Config, ConfigSchema, DEFAULT_CONFIG } from "./types";

const CONFIG_FILE = ".dupe-ledger/config.json";

/**
 * Load configuration from the project's config file.
 * Defaults apply when the file is absent; an invalid file throws.
 */
export function loadConfig(projectPath: string = process.cwd()): Config {
  const configPath = getConfigPath(projectPath);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const rawConfig: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load config from ${configPath}: ${error.message}`,
      );
    }
    throw error;
  }
}

export function getConfigPath(projectPath: string = process.cwd()): string {
  return join(projectPath, CONFIG_FILE);
}

export function getDbPath(
  config: Config,
  projectPath: string = process.cwd(),
): string {
  const { dbPath } = config.storage;
  if (dbPath === IN_MEMORY || isAbsolute(dbPath)) {
    return dbPath;
  }
  return join(projectPath, dbPath);
}

export function getProjectPath(): string {
  return process.env.DUPE_LEDGER_PROJECT ?? process.cwd();
}
