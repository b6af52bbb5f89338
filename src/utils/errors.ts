/**
 * Fatal generator errors
 * Anything recoverable is tracked by the Tracker instead of thrown
 */

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Target directory is missing, not a directory, or cannot be listed
 */
export class DirectoryReadError extends Error {
  override readonly name = "DirectoryReadError";

  constructor(
    readonly directory: string,
    cause: unknown,
  ) {
    super(`Cannot read directory ${directory}: ${describe(cause)}`, { cause });
  }
}

/**
 * Rendered index page could not be written
 */
export class OutputWriteError extends Error {
  override readonly name = "OutputWriteError";

  constructor(
    readonly outputPath: string,
    cause: unknown,
  ) {
    super(`Cannot write ${outputPath}: ${describe(cause)}`, { cause });
  }
}
