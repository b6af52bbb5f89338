/**
 * Extractor Module
 * Reads each snippet and pulls out its title and description
 */

import { readFile } from "fs/promises";
import { load } from "cheerio";
import { filenameToTitle, normalizeWhitespace, truncate } from "../utils";
import type {
  ExtractionConfig,
  GeneratorContext,
  SnippetEntry,
  SnippetFile,
} from "../types";

/**
 * Build an entry from a snippet's HTML
 *
 * Title: first configured selector with text, else derived from the filename
 * Description: meta description, else first non-empty paragraph (truncated), else ""
 */
export function extractMetadata(
  html: string,
  filename: string,
  config: ExtractionConfig,
): SnippetEntry {
  const $ = load(html);

  let title = "";
  for (const selector of config.titleSelectors) {
    title = normalizeWhitespace($(selector).first().text());
    if (title) break;
  }

  let description = "";
  const meta = $("meta")
    .toArray()
    .find((el) => ($(el).attr("name") ?? "").toLowerCase() === "description");
  if (meta) {
    description = normalizeWhitespace($(meta).attr("content") ?? "");
  }

  if (!description) {
    for (const paragraph of $("p").toArray()) {
      const text = normalizeWhitespace($(paragraph).text());
      if (text) {
        description = truncate(text, config.descriptionMaxLength);
        break;
      }
    }
  }

  return {
    filename,
    title: title || filenameToTitle(filename),
    description,
  };
}

/**
 * Build the entry for one file
 * Unreadable files fall back to a filename-derived title and no description
 */
export async function extractEntry(
  file: SnippetFile,
  ctx: GeneratorContext,
): Promise<SnippetEntry> {
  const { config, tracker, logger } = ctx;

  let html: string;
  try {
    html = await readFile(file.path, config.input.encoding);
  } catch (error) {
    tracker.trackError(file.path, error, "file");
    tracker.incrementFallback();
    logger.warn(
      `Could not read ${file.filename}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return {
      filename: file.filename,
      title: filenameToTitle(file.filename),
      description: "",
    };
  }

  const entry = extractMetadata(html, file.filename, config.extraction);
  tracker.incrementExtracted();
  logger.debug(`${file.filename}: ${entry.title}`);
  return entry;
}

/**
 * Extracts an entry for every scanned file, one file at a time
 *
 * Reads from context:
 * - files
 *
 * Writes to context:
 * - entries: Same order as files
 */
export async function extract(ctx: GeneratorContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before extractor");
  }

  const entries: SnippetEntry[] = [];
  for (const file of ctx.files) {
    entries.push(await extractEntry(file, ctx));
  }

  ctx.entries = entries;
}
