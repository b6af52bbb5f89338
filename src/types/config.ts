/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  pattern: z.string(),
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]),
});

export const OutputConfigSchema = z.object({
  filename: z.string().min(1),
  // Path to a custom Handlebars template (null = built-in page)
  template: z.string().nullable(),
});

export const ExtractionConfigSchema = z.object({
  // Tried in order, first element with text wins
  titleSelectors: z.array(z.string()),
  // Paragraph fallback is cut at this length (0 = no limit)
  descriptionMaxLength: z.number().int().nonnegative(),
});

export const PageConfigSchema = z.object({
  lang: z.string(),
  title: z.string(),
  heading: z.string(),
  description: z.string(),
  repositoryUrl: z.string().nullable(),
  // Off by default so regeneration stays byte-identical
  showTimestamp: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const GeneratorConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  extraction: ExtractionConfigSchema,
  page: PageConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialGeneratorConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  extraction: ExtractionConfigSchema.partial().optional(),
  page: PageConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type PageConfig = z.infer<typeof PageConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type PartialGeneratorConfig = z.infer<typeof PartialGeneratorConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
