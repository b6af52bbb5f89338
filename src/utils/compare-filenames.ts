/**
 * Case-insensitive filename ordering with a case-sensitive tie-break,
 * so the order never depends on the locale or on readdir order
 *
 * @example
 * ["b.html", "A.html", "a.html"].sort(compareFilenames) // ["A.html", "a.html", "b.html"]
 */
export function compareFilenames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();

  if (lowerA !== lowerB) {
    return lowerA < lowerB ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
