/**
 * Config command - Show where user settings live and what a run would use
 */

import chalk from "chalk";
import { fileExists, getUserConfigPath, loadConfig } from "../../utils";

interface ConfigOptions {
  config?: string;
}

/**
 * Lines printed by the config command
 */
export async function describeConfig(options: ConfigOptions = {}): Promise<string[]> {
  const configPath = getUserConfigPath();
  const exists = await fileExists(configPath);
  const { config, errors } = await loadConfig(options.config);

  const lines = [
    "User configuration file location:",
    `${configPath} ${exists ? "(found)" : "(not created)"}`,
  ];

  for (const err of errors) {
    const reason = err.error instanceof Error ? err.error.message : String(err.error);
    lines.push(`Skipped ${err.path}: ${reason}`);
  }

  lines.push("", "Effective configuration:", JSON.stringify(config, null, 2));
  return lines;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  for (const line of await describeConfig(options)) {
    console.log(line.startsWith("Skipped ") ? chalk.yellow(line) : line);
  }
}
