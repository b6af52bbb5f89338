/**
 * Generator context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { GeneratorConfig } from "./config";
import type { SnippetEntry, SnippetFile } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

export interface GeneratorContext {
  // Input - provided at initialization
  config: GeneratorConfig;

  // Unified tracking for stats and recovered errors
  tracker: Tracker;
  logger: Logger;

  dryRun?: boolean; // Render without writing the output file
  verbose?: boolean;

  directory?: string; // Resolved target directory (scanner)
  outputPath?: string; // Resolved output file (scanner)
  files?: SnippetFile[]; // Sorted snippet files (scanner)
  entries?: SnippetEntry[]; // One per file, same order (extractor)
  html?: string; // Rendered index page (writer)
  written?: boolean; // True after the page has been written to disk
}
