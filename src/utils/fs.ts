/**
 * Filesystem Utilities
 */

import { access, stat } from "fs/promises";
import { constants } from "node:fs";
import { DirectoryReadError } from "./errors";

/**
 * True when path exists, whatever it points to
 */
export async function fileExists(path: string): Promise<boolean> {
  return access(path, constants.F_OK).then(
    () => true,
    () => false,
  );
}

/**
 * Throws DirectoryReadError unless directory exists, is a directory and is readable
 */
export async function assertReadableDirectory(directory: string): Promise<void> {
  try {
    const stats = await stat(directory);
    if (!stats.isDirectory()) {
      throw new Error("not a directory");
    }
    await access(directory, constants.R_OK);
  } catch (error) {
    throw new DirectoryReadError(directory, error);
  }
}
