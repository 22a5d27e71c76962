/**
 * Splits a free-form pitch list into tokens, line by line and then on commas.
 * Blank pieces (trailing commas, empty lines) are dropped. Order is fretboard order.
 */
export function parsePitchList(text: string): string[] {
  const parts: string[] = [];
  for (const line of text.split(/\r\n|\r|\n/)) {
    for (const segment of line.split(",")) {
      const trimmed = segment.trim();
      if (trimmed) parts.push(trimmed);
    }
  }
  return parts;
}
