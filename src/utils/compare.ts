/**
 * Locale-independent string ordering (UTF-16 code units), so sorted output
 * is identical on every machine.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
