/**
 * Utility exports
 */

// Path/filename utilities
export { filenameToTitle } from "./filename-to-title";
export { compareFilenames } from "./compare-filenames";

// Text utilities
export { normalizeWhitespace, truncate, formatTimestamp } from "./text";

// Filesystem utilities
export { fileExists, assertReadableDirectory } from "./fs";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Errors
export { DirectoryReadError, OutputWriteError } from "./errors";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
