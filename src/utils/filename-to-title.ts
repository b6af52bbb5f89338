/**
 * Convert a filename to a readable title
 * Removes the extension, splits by hyphens/underscores, and title-cases each word
 *
 * @example
 * filenameToTitle("404-page.html") // "404 Page"
 * filenameToTitle("README_notes.html") // "Readme Notes"
 */
export function filenameToTitle(filename: string): string {
  return filename
    .replace(/\.[^.]+$/, "")
    .split(/[-_]/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
