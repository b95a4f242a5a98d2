/**
 * Splits normalized meeting text into legislative item spans.
 */

export interface ItemSpan {
  fileNumber: string | null;
  itemNumber: number | null;
  /** Bracketed title from the heading line, when the heading carries one */
  title: string | null;
  startOffset: number;
  endOffset: number;
}

interface Heading {
  fileNumber: string | null;
  itemNumber: number | null;
  title: string | null;
}

type HeadingPattern = {
  regex: RegExp;
  toHeading: (match: RegExpMatchArray) => Heading;
};

// Each pattern is anchored at the start of a (trimmed) line.
const HEADING_PATTERNS: HeadingPattern[] = [
  {
    // File No. 250210 / File #250210
    regex: /^File\s+(?:No\.?|#)\s*(\d{5,7})\b/i,
    toHeading: (m) => ({ fileNumber: m[1], itemNumber: null, title: null }),
  },
  {
    // 12. 250210 [Title] / 12. [250210] Title
    regex: /^(\d{1,3})[.)]\s+(?:\[(\d{5,7})\]|(\d{5,7})(?=\s|$))(?:\s*\[([^\]]+)\]?)?/,
    toHeading: (m) => ({
      fileNumber: m[2] ?? m[3],
      itemNumber: Number(m[1]),
      title: m[4] ? m[4].trim() : null,
    }),
  },
  {
    // Item 12.  (no file number)
    regex: /^Item\s+(\d{1,3})\s*[.:]/i,
    toHeading: (m) => ({ fileNumber: null, itemNumber: Number(m[1]), title: null }),
  },
];

export function matchHeading(line: string): Heading | null {
  const trimmed = line.trim();
  for (const pattern of HEADING_PATTERNS) {
    const match = trimmed.match(pattern.regex);
    if (match) return pattern.toHeading(match);
  }
  return null;
}

/**
 * Find item spans. A span starts at a heading line and runs to the next
 * heading or the end of the text. Text without headings yields no spans.
 */
export function segment(text: string): ItemSpan[] {
  const spans: ItemSpan[] = [];
  let offset = 0;

  for (const line of text.split('\n')) {
    const heading = matchHeading(line);
    if (heading) {
      const previous = spans[spans.length - 1];
      if (previous) previous.endOffset = offset;
      spans.push({ ...heading, startOffset: offset, endOffset: text.length });
    }
    offset += line.length + 1;
  }

  return spans;
}

/**
 * Text before the first item heading (roll call, boilerplate, meeting date).
 */
export function frontMatter(text: string, spans: ItemSpan[]): string {
  return spans.length > 0 ? text.slice(0, spans[0].startOffset) : text;
}

export function spanText(text: string, span: ItemSpan): string {
  return text.slice(span.startOffset, span.endOffset);
}
