/**
 * File-related type definitions
 */

export interface SnippetFile {
  filename: string; // Base filename with extension (e.g., "color-picker.html")
  path: string; // Absolute path to the snippet
}

export interface SnippetEntry {
  filename: string;
  title: string; // Never empty: falls back to a title derived from the filename
  description: string; // May be empty
}

// ============================================================================
// Template Context Types
// ============================================================================

/**
 * Context passed to the index template
 * Available variables in index.html.hbs
 */
export interface IndexTemplateContext {
  // Page metadata
  lang: string;
  title: string;
  heading: string;
  description: string;
  repositoryUrl?: string;
  generatedAt?: string; // "YYYY-MM-DD HH:MM:SS", only when page.showTimestamp is on

  // Listing
  entries: Array<
    SnippetEntry & {
      href: string; // Filename encoded as a single URI component
    }
  >;
}
