/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private level: LogLevel = "info") {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error !== undefined) {
      console.error(error);
    }
  }
}
