/**
 * Generator - Pipeline orchestrator
 * Coordinates the index pipeline with zero business logic
 */

import * as modules from "./modules";
import { Logger, Tracker } from "./utils";
import type { GeneratorConfig, GeneratorContext, SnippetEntry } from "./types";

export type GeneratorStage = "scan" | "extract" | "write";

export interface GenerationResult {
  outputPath: string;
  entries: SnippetEntry[];
  html: string;
  written: boolean;
}

interface ContextOptions {
  tracker?: Tracker;
  logger?: Logger;
  dryRun?: boolean;
  verbose?: boolean;
}

export function createContext(
  config: GeneratorConfig,
  options: ContextOptions = {},
): GeneratorContext {
  return {
    config,
    tracker: options.tracker ?? new Tracker(),
    logger: options.logger ?? new Logger(config.logging.level),
    dryRun: options.dryRun,
    verbose: options.verbose,
  };
}

/**
 * Run scan → extract → write over the context
 * Throws DirectoryReadError / OutputWriteError on fatal failures
 */
export async function generateIndex(
  ctx: GeneratorContext,
  onStage?: (stage: GeneratorStage) => void,
): Promise<GenerationResult> {
  onStage?.("scan");
  await modules.scan(ctx);

  onStage?.("extract");
  await modules.extract(ctx);

  onStage?.("write");
  await modules.write(ctx);

  if (!ctx.outputPath || !ctx.entries || ctx.html === undefined) {
    throw new Error("Pipeline finished without producing an index page");
  }

  return {
    outputPath: ctx.outputPath,
    entries: ctx.entries,
    html: ctx.html,
    written: ctx.written ?? false,
  };
}
