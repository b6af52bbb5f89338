/**
 * Scanner Module
 * Discovers snippet files in the target directory in a deterministic order
 */

import glob from "fast-glob";
import path from "node:path";
import {
  assertReadableDirectory,
  compareFilenames,
  DirectoryReadError,
} from "../utils";
import type { GeneratorContext, SnippetFile } from "../types";

/**
 * Scans the target directory for snippet files and populates context
 *
 * Writes to context:
 * - directory: Resolved target directory
 * - outputPath: Resolved index page path (never listed as a snippet)
 * - files: Snippet files sorted by filename
 */
export async function scan(ctx: GeneratorContext): Promise<void> {
  const { config, tracker, logger } = ctx;
  const directory = path.resolve(config.input.directory);
  const outputPath = path.resolve(directory, config.output.filename);

  await assertReadableDirectory(directory);

  let matches: string[];
  try {
    matches = await glob(config.input.pattern, {
      cwd: directory,
      onlyFiles: true,
    });
  } catch (error) {
    throw new DirectoryReadError(directory, error);
  }

  const files: SnippetFile[] = matches
    .map((filename) => ({
      filename,
      path: path.join(directory, filename),
    }))
    .filter((file) => file.path !== outputPath)
    .sort((a, b) => compareFilenames(a.filename, b.filename));

  tracker.setTotalFiles(files.length);
  logger.debug(`Found ${files.length} snippet file(s) in ${directory}`);

  ctx.directory = directory;
  ctx.outputPath = outputPath;
  ctx.files = files;
}
