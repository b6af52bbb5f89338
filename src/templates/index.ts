/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type { IndexTemplateContext } from "../types";

const __dirname = dirname(fileURLToPath(import.meta.url));

export type IndexTemplate = Handlebars.TemplateDelegate<IndexTemplateContext>;

// Usage: {{pluralize entries.length "snippet" "snippets"}}
Handlebars.registerHelper(
  "pluralize",
  (count: unknown, singular: unknown, plural: unknown) =>
    count === 1 ? singular : plural,
);

/**
 * Path of the built-in index page template
 */
export function getDefaultIndexTemplatePath(): string {
  return join(__dirname, "index.html.hbs");
}

/**
 * Load and compile the index template from a custom path or the built-in one
 * Throws error if the template fails to load
 */
export async function loadIndexTemplate(
  templatePath: string | null,
): Promise<IndexTemplate> {
  const source = await readFile(
    templatePath ?? getDefaultIndexTemplatePath(),
    "utf-8",
  );
  return Handlebars.compile<IndexTemplateContext>(source);
}
