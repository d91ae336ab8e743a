/**
 * Wrap text at word boundaries so that no line exceeds `width` characters,
 * unless a single word is longer than `width` (words are never cut).
 * Existing line breaks are kept.
 */
export function wordWrap(text: string, width: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    let current: string | null = null;
    for (const word of paragraph.split(' ')) {
      if (current === null) {
        current = word;
      } else if (current.length + 1 + word.length <= width) {
        current += ` ${word}`;
      } else {
        lines.push(current);
        current = word;
      }
    }
    lines.push(current ?? '');
  }

  return lines;
}
