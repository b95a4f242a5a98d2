/**
 * Content-addressed document identifiers used for deduplication.
 */

import crypto from 'crypto';
import { type DocumentKind, toIsoDate } from '../shared/types';

const ID_LENGTH = 16;

/**
 * Compute the stable identifier of a document.
 *
 * Only the calendar day of the date takes part, so a document listed with a
 * time component on one run and without it on the next keeps its id. A
 * document re-published under a new URL gets a new id.
 *
 * @param sourceUrl - Absolute document URL
 * @param kind - Agenda or minutes
 * @param publishedDate - Meeting date, or null when the source gives none
 * @returns 16-character hex id
 */
export function identify(sourceUrl: string, kind: DocumentKind, publishedDate: Date | null): string {
  const day = publishedDate ? toIsoDate(publishedDate) : '';
  const key = `${sourceUrl.trim()}|${kind}|${day}`;

  return crypto.createHash('sha256').update(key, 'utf8').digest('hex').slice(0, ID_LENGTH);
}
