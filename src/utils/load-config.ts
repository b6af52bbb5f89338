/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  GeneratorConfig,
  PartialGeneratorConfig,
} from "../types";
import {
  GeneratorConfigSchema,
  PartialGeneratorConfigSchema,
} from "../types";
import { fileExists } from "./fs";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("snippet-index", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/snippet-index or ~/.config/snippet-index
 * - macOS: ~/Library/Preferences/snippet-index
 * - Windows: %APPDATA%\snippet-index\Config
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<GeneratorConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return GeneratorConfigSchema.parse(JSON.parse(content));
}

/**
 * Read and validate a partial config file
 * Throws on unreadable file, invalid JSON or schema mismatch
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialGeneratorConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialGeneratorConfigSchema.parse(JSON.parse(content));
}

/**
 * Merge a partial config over a complete one, section by section
 */
export function mergeConfig(
  base: GeneratorConfig,
  override: PartialGeneratorConfig,
): GeneratorConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    extraction: { ...base.extraction, ...override.extraction },
    page: { ...base.page, ...override.page },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: GeneratorConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported in errors
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
