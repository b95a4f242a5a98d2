/**
 * Meeting date extraction from URLs, link text and page text.
 */

const MONTHS: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
};

type DatePattern = {
  regex: RegExp;
  toParts: (match: RegExpMatchArray) => [year: number, month: number, day: number] | null;
};

// Tried in order; the first pattern that yields a real calendar date wins.
const DATE_PATTERNS: DatePattern[] = [
  {
    // 2025-03-04, 2025_03_04
    regex: /(\d{4})[_-](\d{2})[_-](\d{2})/,
    toParts: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    // 03-04-2025, 03_04_2025
    regex: /(\d{2})[_-](\d{2})[_-](\d{4})/,
    toParts: (m) => [Number(m[3]), Number(m[1]), Number(m[2])],
  },
  {
    // 3/4/2025
    regex: /(\d{1,2})\/(\d{1,2})\/(\d{4})/,
    toParts: (m) => [Number(m[3]), Number(m[1]), Number(m[2])],
  },
  {
    // March 4, 2025
    regex: /(january|february|march|april|may|june|july|august|september|october|november|december)\s+(\d{1,2}),?\s+(\d{4})/i,
    toParts: (m) => {
      const month = MONTHS[m[1].toLowerCase()];
      return month ? [Number(m[3]), month, Number(m[2])] : null;
    },
  },
  {
    // 030425 (MMDDYY, as in SF minutes file names like bag030425_minutes.pdf)
    regex: /(?<!\d)(\d{2})(\d{2})(\d{2})(?=_(?:agenda|minutes)|\.pdf)/i,
    toParts: (m) => [2000 + Number(m[3]), Number(m[1]), Number(m[2])],
  },
];

/**
 * Build a UTC midnight date, or null when the parts are not a real day.
 */
export function makeDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;

  return date;
}

/**
 * Find the first date in a piece of text.
 */
export function parseDate(text: string): Date | null {
  for (const pattern of DATE_PATTERNS) {
    const match = text.match(pattern.regex);
    if (!match) continue;

    const parts = pattern.toParts(match);
    const date = parts ? makeDate(...parts) : null;
    if (date) return date;
  }
  return null;
}

/**
 * Extract a meeting date, trying the URL first, then the link text, then the
 * surrounding context. Returns null when none of them contains a date.
 */
export function extractMeetingDate(url: string, linkText: string, context: string = ''): Date | null {
  for (const text of [decodeURIComponentSafe(url), linkText, context]) {
    const date = parseDate(text);
    if (date) return date;
  }
  return null;
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
