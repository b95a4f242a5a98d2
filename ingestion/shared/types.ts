/**
 * Type definitions shared by the scraping and extraction stages.
 */

/**
 * Kinds of meeting documents the sources publish
 */
export type DocumentKind = 'agenda' | 'minutes';

/**
 * Lifecycle of a document within one scraping pass
 */
export type DocumentStatus = 'discovered' | 'fetched' | 'failed';

/**
 * Document descriptor produced by a source's discovery step
 */
export interface CandidateDocument {
  id: string;
  source: string;
  url: string;
  kind: DocumentKind;
  dateHint: Date | null;
  title?: string;
}

/**
 * Document acquired during a scraping pass
 */
export interface DocumentRecord {
  id: string;
  source: string;
  kind: DocumentKind;
  sourceUrl: string;
  publishedDate: Date | null;
  title?: string;
  rawBytes: Buffer;
  status: DocumentStatus;
}

/** Line placed between pages in normalized text */
export const PAGE_BREAK = '\f';

export type VoteChoice = 'aye' | 'no' | 'abstain' | 'absent' | 'excused';

export const VOTE_CHOICES: readonly VoteChoice[] = ['aye', 'no', 'abstain', 'absent', 'excused'];

/**
 * Vote counts by choice. `null` means the count is not known.
 */
export type Tallies = Record<VoteChoice, number | null>;

export type LegislationResult = 'approved' | 'rejected' | 'pending' | 'unknown';

/**
 * Board member reference data
 */
export interface MemberIdentity {
  canonicalName: string;
  aliases: string[];
  districtOrSeat: number | null;
}

/**
 * One member's vote on one item
 */
export interface VoteRecord {
  itemKey: string;
  memberName: string; // canonical name, or the raw token when unresolved
  choice: VoteChoice;
  rawToken: string;
  unresolved: boolean;
  candidates: string[]; // canonical names an ambiguous token could refer to
  inferred: boolean; // absence implied by the closed-world roll-call convention
}

export type ItemAnnotation =
  | {
      type: 'vote-count-mismatch';
      choice: VoteChoice;
      stated: number;
      attributed: number;
    }
  | {
      type: 'conflicting-vote';
      memberName: string;
      choices: VoteChoice[];
    };

/**
 * Legislative item extracted from a meeting document
 */
export interface LegislationItem {
  key: string;
  fileNumber: string | null;
  itemNumber: number | null;
  title: string;
  meetingDate: Date | null;
  description: string;
  tallies: Tallies;
  result: LegislationResult;
  votes: VoteRecord[];
  annotations: ItemAnnotation[];
}

export function emptyTallies(): Tallies {
  return { aye: null, no: null, abstain: null, absent: null, excused: null };
}

/**
 * Format a date as YYYY-MM-DD using its UTC calendar day
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
