/**
 * San Francisco Board of Supervisors meetings page source.
 *
 * Lists the agenda and minutes PDFs linked from the full-board meetings page.
 */

import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { identify } from '../scraping/identity';
import type { CandidateDocument, DocumentKind } from '../shared/types';
import { extractMeetingDate } from './dates';
import { createHttpClient, downloadDocument, toFetchError } from './http';
import type { HttpOptions, SourceAdapter } from './types';

export const SFBOS_SOURCE_NAME = 'sfbos';

const PDF_HREF = /\.pdf(?:$|[?#])/i;
const MEETING_SECTION_CLASS = /meeting|event/i;

/**
 * Classify a link as agenda or minutes from its text or URL.
 */
export function classifyDocument(linkText: string, url: string): DocumentKind | null {
  const text = linkText.toLowerCase();
  const href = url.toLowerCase();

  if (text.includes('minute') || href.includes('minute')) return 'minutes';
  if (text.includes('agenda') || href.includes('agenda')) return 'agenda';
  return null;
}

/**
 * Parse the meetings page into candidates, most recent first.
 *
 * Links are read from meeting/event sections when the page has them, and from
 * the whole page otherwise. Relative links are resolved against the page URL.
 * PDFs that are neither agendas nor minutes are ignored.
 */
export function parseMeetingListing(
  html: string,
  pageUrl: string,
  sourceName: string = SFBOS_SOURCE_NAME
): CandidateDocument[] {
  const $ = cheerio.load(html);

  let sections = $('div, article, section')
    .toArray()
    .filter((el) => MEETING_SECTION_CLASS.test($(el).attr('class') ?? ''));
  if (sections.length === 0) {
    sections = $('body').toArray();
  }

  const byUrl = new Map<string, CandidateDocument>();

  for (const section of sections) {
    for (const link of $(section).find('a[href]').toArray()) {
      const href = $(link).attr('href')?.trim() ?? '';
      if (!PDF_HREF.test(href)) continue;

      let url: string;
      try {
        url = new URL(href, pageUrl).href;
      } catch {
        console.log(`  [${sourceName}] Skipping malformed link: ${href}`);
        continue;
      }
      if (byUrl.has(url)) continue;

      const linkText = $(link).text().replace(/\s+/g, ' ').trim();
      const kind = classifyDocument(linkText, url);
      if (!kind) continue;

      const context = $(link).closest('tr, li, p, div').text().replace(/\s+/g, ' ').trim();
      const dateHint = extractMeetingDate(url, linkText, context);

      byUrl.set(url, {
        id: identify(url, kind, dateHint),
        source: sourceName,
        url,
        kind,
        dateHint,
        title: linkText || undefined,
      });
    }
  }

  return sortMostRecentFirst([...byUrl.values()]);
}

/**
 * Stable sort by date, newest first; undated documents go last in page order.
 */
export function sortMostRecentFirst(candidates: CandidateDocument[]): CandidateDocument[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => {
      const aTime = a.candidate.dateHint?.getTime() ?? Number.NEGATIVE_INFINITY;
      const bTime = b.candidate.dateHint?.getTime() ?? Number.NEGATIVE_INFINITY;
      if (aTime !== bTime) return bTime - aTime;
      return a.index - b.index;
    })
    .map(({ candidate }) => candidate);
}

export class SfbosSource implements SourceAdapter {
  readonly name: string;
  private meetingsUrl: string;
  private http: AxiosInstance;
  private delayMs: number;

  constructor(meetingsUrl: string, options: HttpOptions, http?: AxiosInstance, name: string = SFBOS_SOURCE_NAME) {
    this.name = name;
    this.meetingsUrl = meetingsUrl;
    this.http = http || createHttpClient(options);
    this.delayMs = options.delayMs;
  }

  async *discover(): AsyncIterable<CandidateDocument> {
    let html: string;
    try {
      const response = await this.http.get<string>(this.meetingsUrl, { responseType: 'text' });
      html = response.data;
    } catch (error) {
      throw toFetchError(this.meetingsUrl, error);
    }

    const candidates = parseMeetingListing(html, this.meetingsUrl, this.name);
    console.log(`  [${this.name}] Found ${candidates.length} agenda/minutes link(s)`);

    yield* candidates;
  }

  async fetch(candidate: CandidateDocument): Promise<Buffer> {
    return downloadDocument(this.http, candidate.url, this.delayMs);
  }
}
