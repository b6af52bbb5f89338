/**
 * Writer Module
 * Renders the index page and writes it over the previous one
 */

import { writeFile } from "fs/promises";
import { loadIndexTemplate } from "../templates";
import { formatTimestamp, OutputWriteError } from "../utils";
import type {
  GeneratorContext,
  IndexTemplateContext,
  PageConfig,
  SnippetEntry,
} from "../types";

/**
 * Build the template context for the index page
 */
export function buildIndexContext(
  entries: SnippetEntry[],
  page: PageConfig,
  now: Date = new Date(),
): IndexTemplateContext {
  return {
    lang: page.lang,
    title: page.title,
    heading: page.heading,
    description: page.description,
    repositoryUrl: page.repositoryUrl ?? undefined,
    generatedAt: page.showTimestamp ? formatTimestamp(now) : undefined,
    entries: entries.map((entry) => ({
      ...entry,
      href: encodeURIComponent(entry.filename),
    })),
  };
}

/**
 * Renders and writes the index page
 *
 * Reads from context:
 * - entries
 * - outputPath
 *
 * Writes to context:
 * - html: Rendered page (also set on dry runs)
 * - written: True once the page is on disk
 */
export async function write(ctx: GeneratorContext): Promise<void> {
  if (!ctx.entries || !ctx.outputPath) {
    throw new Error("Scanner and extractor must run before writer");
  }

  const { config, logger, outputPath } = ctx;
  const template = await loadIndexTemplate(config.output.template);
  const html = template(buildIndexContext(ctx.entries, config.page));

  ctx.html = html;
  ctx.written = false;

  if (ctx.dryRun) {
    logger.debug(`Dry run: ${outputPath} not written`);
    return;
  }

  try {
    await writeFile(outputPath, html, "utf-8");
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }

  ctx.written = true;
}
