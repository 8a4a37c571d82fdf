/**
 * Configuration loader with multi-path resolution and validation
 *
 * Config resolution order:
 * 1. Explicit path (if provided)
 * 2. Local directory (./searxng-pager.config.json)
 * 3. XDG config ($XDG_CONFIG_HOME/searxng-pager/config.json)
 *
 * When no file exists the default configuration points at $SEARXNG_URL, or a
 * local instance on port 8888.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { SearxngPagerConfig } from "./validation";
import { formatValidationErrors, validateConfigSafe } from "./validation";

/** Used when neither a config file nor SEARXNG_URL is present */
export const DEFAULT_BASE_URL = "http://localhost:8888";

/** Config file base names */
const CONFIG_FILENAMES = {
  local: "searxng-pager.config.json",
  xdg: "config.json",
} as const;

/**
 * Get all possible config file paths in order of preference
 */
export function getConfigPaths(explicitPath?: string): string[] {
  const paths: string[] = [];

  if (explicitPath) {
    paths.push(explicitPath);
  }

  paths.push(join(process.cwd(), CONFIG_FILENAMES.local));

  const xdg = process.env.XDG_CONFIG_HOME;
  const baseDir = xdg ?? join(homedir(), ".config");
  paths.push(join(baseDir, "searxng-pager", CONFIG_FILENAMES.xdg));

  return paths;
}

/**
 * Get default configuration when no config file is found
 */
export function getDefaultConfig(): SearxngPagerConfig {
  return {
    baseUrl: process.env.SEARXNG_URL ?? DEFAULT_BASE_URL,
  };
}

function loadJsonConfig(path: string): unknown {
  const raw = readFileSync(path, "utf8");
  return JSON.parse(raw);
}

/**
 * Load configuration from the first available config file
 *
 * @param explicitPath Optional explicit path to config file
 * @returns Parsed and validated configuration
 * @throws Error if an explicit path does not exist, a file cannot be parsed,
 *   or validation fails
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const custom = loadConfig("./staging.json");
 * ```
 */
export function loadConfig(explicitPath?: string): SearxngPagerConfig {
  if (explicitPath && !existsSync(explicitPath)) {
    throw new Error(`Config file not found: ${explicitPath}`);
  }

  for (const path of getConfigPaths(explicitPath)) {
    if (!existsSync(path)) {
      continue;
    }

    let rawConfig: unknown;
    try {
      rawConfig = loadJsonConfig(path);
    } catch (error) {
      throw new Error(
        `Failed to load config file at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const result = validateConfigSafe(rawConfig);
    if (result.success) {
      return result.data;
    }

    const errors = formatValidationErrors(result.error);
    throw new Error(
      `Invalid configuration in ${path}:\n${errors.map((e) => `  - ${e}`).join("\n")}`,
    );
  }

  return getDefaultConfig();
}

/**
 * Check if a config file exists at any of the standard locations
 */
export function configExists(): boolean {
  return getConfigPaths().some((path) => existsSync(path));
}
