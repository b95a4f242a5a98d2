/**
 * Builds LegislationItems from a normalized meeting document.
 */

import type { MemberResolver } from '../members/resolver';
import { parseDate } from '../sources/dates';
import { type DocumentKind, type LegislationItem, emptyTallies } from '../shared/types';
import { type ItemSpan, frontMatter, matchHeading, segment, spanText } from './segmenter';
import { extractResult, extractVotes } from './votes';

export interface ItemSource {
  kind: DocumentKind;
  publishedDate: Date | null;
}

export function itemKeyOf(span: ItemSpan, ordinal: number): string {
  if (span.fileNumber) return span.fileNumber;
  return `item-${span.itemNumber ?? ordinal}`;
}

function bodyLines(text: string, span: ItemSpan): string[] {
  return spanText(text, span)
    .split('\n')
    .slice(1)
    // trim() also drops the page-break sentinel
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Title from the heading's bracket, else the first body line, else the
 * heading line itself.
 */
export function itemTitle(text: string, span: ItemSpan): string {
  if (span.title) return span.title;

  const [firstLine] = bodyLines(text, span);
  if (firstLine && !matchHeading(firstLine)) return firstLine;

  return spanText(text, span).split('\n')[0].trim();
}

export function itemDescription(text: string, span: ItemSpan): string {
  return bodyLines(text, span).join(' ').replace(/\s+/g, ' ').trim();
}

/**
 * Meeting date from the document's listing, else the first date in the text
 * before the first item.
 */
export function resolveMeetingDate(text: string, publishedDate: Date | null): Date | null {
  return publishedDate ?? parseDate(frontMatter(text, segment(text)));
}

function evidence(item: LegislationItem): number {
  const knownTallies = Object.values(item.tallies).filter((count) => count !== null).length;
  return item.votes.length + knownTallies;
}

/**
 * Segment a document and extract one item per distinct key.
 *
 * Agenda items carry no votes and stay pending. When a file number appears
 * twice in one document, the span with the most vote evidence is kept (the
 * first one on a tie).
 */
export function buildItems(text: string, source: ItemSource, resolver: MemberResolver): LegislationItem[] {
  const spans = segment(text);
  const meetingDate = source.publishedDate ?? parseDate(frontMatter(text, spans));

  const byKey = new Map<string, LegislationItem>();

  spans.forEach((span, index) => {
    const key = itemKeyOf(span, index + 1);
    const base = {
      key,
      fileNumber: span.fileNumber,
      itemNumber: span.itemNumber,
      title: itemTitle(text, span),
      meetingDate,
      description: itemDescription(text, span),
    };

    let item: LegislationItem;
    if (source.kind === 'agenda') {
      item = { ...base, tallies: emptyTallies(), result: 'pending', votes: [], annotations: [] };
    } else {
      const extraction = extractVotes(span, text, resolver, key);
      item = {
        ...base,
        tallies: extraction.tallies,
        result: extractResult(spanText(text, span)),
        votes: extraction.votes,
        annotations: extraction.annotations,
      };
    }

    const existing = byKey.get(key);
    if (!existing || evidence(item) > evidence(existing)) {
      byKey.set(key, item);
    }
  });

  return [...byKey.values()];
}
