/**
 * Legistar calendar source.
 *
 * Reads meeting events from the public Legistar Web API and yields the agenda
 * and minutes PDF of each event that has them.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { identify } from '../scraping/identity';
import type { CandidateDocument, DocumentKind } from '../shared/types';
import { makeDate } from './dates';
import { createHttpClient, downloadDocument, toFetchError } from './http';
import type { HttpOptions, SourceAdapter } from './types';

export const LEGISTAR_SOURCE_NAME = 'legistar';

const LEGISTAR_API = 'https://webapi.legistar.com/v1';

const eventSchema = z
  .object({
    EventId: z.number(),
    EventBodyName: z.string(),
    EventDate: z.string(),
    EventAgendaFile: z.string().nullable().optional(),
    EventMinutesFile: z.string().nullable().optional(),
  })
  .passthrough();

const eventsSchema = z.array(eventSchema);

export type LegistarEvent = z.infer<typeof eventSchema>;

export interface LegistarOptions {
  client: string;
  bodyName: string;
  maxEvents?: number;
}

/**
 * Parse Legistar's "2025-03-04T00:00:00" event dates as a UTC calendar day.
 */
export function parseEventDate(value: string): Date | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})/);
  return match ? makeDate(Number(match[1]), Number(match[2]), Number(match[3])) : null;
}

/**
 * Turn API events into candidates. Minutes come before the agenda of the same
 * meeting, and events keep the API's newest-first order.
 */
export function eventsToCandidates(events: LegistarEvent[], sourceName: string = LEGISTAR_SOURCE_NAME): CandidateDocument[] {
  const candidates: CandidateDocument[] = [];

  for (const event of events) {
    const dateHint = parseEventDate(event.EventDate);
    const files: [DocumentKind, string | null | undefined][] = [
      ['minutes', event.EventMinutesFile],
      ['agenda', event.EventAgendaFile],
    ];

    for (const [kind, url] of files) {
      if (!url) continue;
      candidates.push({
        id: identify(url, kind, dateHint),
        source: sourceName,
        url,
        kind,
        dateHint,
        title: `${event.EventBodyName} ${kind === 'minutes' ? 'Minutes' : 'Agenda'}`,
      });
    }
  }

  return candidates;
}

export class LegistarSource implements SourceAdapter {
  readonly name: string;
  private options: LegistarOptions;
  private http: AxiosInstance;
  private delayMs: number;

  constructor(options: LegistarOptions, httpOptions: HttpOptions, http?: AxiosInstance, name: string = LEGISTAR_SOURCE_NAME) {
    this.name = name;
    this.options = options;
    this.http = http || createHttpClient(httpOptions);
    this.delayMs = httpOptions.delayMs;
  }

  getEventsUrl(): string {
    return `${LEGISTAR_API}/${encodeURIComponent(this.options.client)}/events`;
  }

  async *discover(): AsyncIterable<CandidateDocument> {
    const url = this.getEventsUrl();
    const escapedBody = this.options.bodyName.replace(/'/g, "''");

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        params: {
          $filter: `EventBodyName eq '${escapedBody}'`,
          $orderby: 'EventDate desc',
          $top: this.options.maxEvents ?? 100,
        },
      });
      data = response.data;
    } catch (error) {
      throw toFetchError(url, error);
    }

    const parsed = eventsSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected Legistar events payload: ${parsed.error.issues[0]?.message}`);
    }

    const candidates = eventsToCandidates(parsed.data, this.name);
    console.log(`  [${this.name}] Found ${parsed.data.length} event(s), ${candidates.length} document(s)`);

    yield* candidates;
  }

  async fetch(candidate: CandidateDocument): Promise<Buffer> {
    return downloadDocument(this.http, candidate.url, this.delayMs);
  }
}
