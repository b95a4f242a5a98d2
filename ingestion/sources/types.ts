/**
 * Contract every upstream meeting-document source implements.
 */

import type { CandidateDocument } from '../shared/types';

export interface SourceAdapter {
  /** Stable name, used for the state file and the local PDF archive */
  readonly name: string;

  /**
   * List candidate documents, most recent first.
   *
   * The sequence is finite. Calling discover() again restarts the listing.
   */
  discover(): AsyncIterable<CandidateDocument>;

  /**
   * Retrieve the raw bytes of a candidate.
   *
   * @throws {FetchError} Classified as transient or permanent
   */
  fetch(candidate: CandidateDocument): Promise<Buffer>;
}

export interface HttpOptions {
  timeoutMs: number;
  delayMs: number;
  userAgent: string;
}
