/**
 * Central type exports
 */

// Configuration
export type {
  GeneratorConfig,
  PartialGeneratorConfig,
  InputConfig,
  OutputConfig,
  ExtractionConfig,
  PageConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  GeneratorConfigSchema,
  PartialGeneratorConfigSchema,
} from "./config";

// Files
export type { SnippetFile, SnippetEntry, IndexTemplateContext } from "./files";

// Context
export type { GeneratorContext } from "./context";

// Tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  GenerationStats,
} from "./tracker";
