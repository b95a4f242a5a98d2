/**
 * Text extraction module for meeting documents
 *
 * Converts PDF bytes into plain text and a lightly structured markdown form.
 * Line order is kept as pdf-parse reports it, and page boundaries are marked
 * so item spans that cross a page can be recognized downstream.
 */

import pdfParse from 'pdf-parse';
import { UnreadablePdfError, describeError } from '../shared/errors';
import { PAGE_BREAK } from '../shared/types';

const ITEM_HEADING = /^(?:File\s+(?:No\.?|#)\s*\d+|\d{1,3}[.)]\s+\[?\d{5,7}\]?(?:\s|$))/i;
const MAX_HEADER_LENGTH = 100;

/** Text run as reported by pdf.js `getTextContent()` */
export interface PdfTextItem {
  str: string;
  /** Affine transform; index 5 is the baseline y */
  transform: number[];
}

interface PdfPageData {
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<{
    items: PdfTextItem[];
  }>;
}

export interface NormalizedDocument {
  text: string;
  markdown: string;
  pageCount: number;
}

/**
 * Clean extraction artifacts from one page without reordering lines.
 *
 * Removes null bytes (which PostgreSQL rejects), normalizes line endings and
 * strips trailing whitespace.
 */
export function cleanPageText(page: string): string {
  return page
    .replace(/\x00/g, '')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .replace(/^\n+|\n+$/g, '');
}

/**
 * Lay out one page's text runs, starting a new line whenever the baseline
 * changes (the same layout pdf-parse uses for its joined text).
 */
export function renderPageText(items: PdfTextItem[]): string {
  let text = '';
  let lastY: number | null = null;

  for (const item of items) {
    const y = item.transform[5];
    text += lastY === null || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/**
 * Join cleaned pages with the page-break sentinel on its own line.
 */
export function pagesToText(pages: string[]): string {
  return pages.map(cleanPageText).join(`\n${PAGE_BREAK}\n`);
}

/**
 * Render pages as markdown: page markers, short all-caps lines as section
 * headers and item headings as sub-headers.
 */
export function pagesToMarkdown(pages: string[]): string {
  const out: string[] = [];

  pages.forEach((page, index) => {
    if (index > 0) out.push('');
    out.push(`<!-- page ${index + 1} -->`);

    for (const rawLine of cleanPageText(page).split('\n')) {
      const line = rawLine.trim();
      if (!line) {
        out.push('');
      } else if (ITEM_HEADING.test(line)) {
        out.push(`### ${line}`);
      } else if (isSectionHeader(line)) {
        out.push(`## ${line}`);
      } else {
        out.push(line);
      }
    }
  });

  return out.join('\n');
}

function isSectionHeader(line: string): boolean {
  return line.length < MAX_HEADER_LENGTH && /[A-Z]/.test(line) && line === line.toUpperCase();
}

export class TextExtractor {
  /**
   * Parse a PDF into pages.
   *
   * @throws {UnreadablePdfError} If pdf-parse fails or the document has no text layer
   */
  async extractPages(rawBytes: Buffer): Promise<string[]> {
    if (rawBytes.length === 0) {
      throw new UnreadablePdfError('empty file');
    }

    // One entry per page, in page order
    const pageTexts: Promise<string>[] = [];
    const collectPage = (pageData: PdfPageData): string => {
      pageTexts.push(
        pageData
          .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
          .then((content) => renderPageText(content.items))
      );
      return '';
    };

    let pages: string[];

    // Suppress pdf.js font warnings (TT: undefined function, etc.)
    const originalWarn = console.warn;
    console.warn = () => {};
    try {
      await pdfParse(rawBytes, { pagerender: collectPage });
      pages = await Promise.all(pageTexts);
    } catch (error) {
      await Promise.allSettled(pageTexts);
      throw new UnreadablePdfError(describeError(error));
    } finally {
      console.warn = originalWarn;
    }

    if (pages.every((page) => page.trim().length === 0)) {
      throw new UnreadablePdfError('no extractable text (image-only scan?)');
    }

    return pages;
  }

  async normalize(rawBytes: Buffer): Promise<NormalizedDocument> {
    const pages = await this.extractPages(rawBytes);
    return {
      text: pagesToText(pages),
      markdown: pagesToMarkdown(pages),
      pageCount: pages.length,
    };
  }

  async toText(rawBytes: Buffer): Promise<string> {
    return pagesToText(await this.extractPages(rawBytes));
  }

  async toMarkdown(rawBytes: Buffer): Promise<string> {
    return pagesToMarkdown(await this.extractPages(rawBytes));
  }
}
