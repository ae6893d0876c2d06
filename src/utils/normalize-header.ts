/** Case/whitespace-insensitive key for matching column headers against aliases. */
export function normalizeHeader(header: unknown): string {
  return String(header ?? '')
    .normalize('NFKC')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
}
