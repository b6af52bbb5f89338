/**
 * Text Utilities
 */

/**
 * Collapse runs of whitespace (including newlines) into single spaces and trim
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Cut text to maxLength code points and append "..." when it was longer
 * A maxLength of 0 disables truncation
 *
 * @example
 * truncate("abcdef", 3) // "abc..."
 */
export function truncate(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  if (maxLength === 0 || codePoints.length <= maxLength) {
    return text;
  }
  return `${codePoints.slice(0, maxLength).join("")}...`;
}

/**
 * Format a date as local "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
