/**
 * Incremental acquisition: discover, filter against state, fetch what is new.
 *
 * Process:
 * 1. Read the full discovery listing
 * 2. Split it into already-acquired and to-fetch candidates
 * 3. Cap the to-fetch list at `limit`, keeping discovery order
 * 4. Fetch one document at a time, recording each outcome; a document is
 *    marked seen once it is fetched and handed off
 * 5. Save the state once
 */

import { FetchError, describeError } from '../shared/errors';
import type { CandidateDocument, DocumentRecord } from '../shared/types';
import type { SourceAdapter } from '../sources/types';
import type { ScrapeState } from './state';

export interface RunOptions {
  limit?: number;
  force?: boolean;
  /**
   * Called after each successful fetch, before the next one starts. The
   * document is marked seen only once this resolves; when it rejects the
   * document stays new and is fetched again on the next run.
   */
  onFetched?: (record: DocumentRecord) => Promise<void>;
}

export interface FailedCandidate {
  candidate: CandidateDocument;
  error: Error;
}

export interface RunResult {
  fetched: DocumentRecord[];
  /** Already acquired (or permanently rejected) candidates, plus duplicate listings */
  skipped: number;
  /** New candidates left for a later run because of `limit` */
  deferred: number;
  failed: FailedCandidate[];
  /** Fetched, but `onFetched` rejected; left unmarked */
  unprocessed: FailedCandidate[];
}

/**
 * Split candidates into the ones to fetch and the number skipped.
 */
export function partitionCandidates(
  candidates: CandidateDocument[],
  state: ScrapeState,
  force: boolean
): { toFetch: CandidateDocument[]; skipped: number } {
  const listed = new Set<string>();
  const toFetch: CandidateDocument[] = [];
  let skipped = 0;

  for (const candidate of candidates) {
    if (listed.has(candidate.id)) {
      skipped++;
      continue;
    }
    listed.add(candidate.id);

    if (!force && (state.contains(candidate.id) || state.isRejected(candidate.id))) {
      skipped++;
      continue;
    }
    toFetch.push(candidate);
  }

  return { toFetch, skipped };
}

/**
 * Run one acquisition pass for a source.
 *
 * A failed fetch or a rejected onFetched never stops the batch. The state is
 * saved exactly once after the loop, so a crash mid-batch re-fetches that
 * batch on the next run.
 *
 * @throws If discovery itself fails or the state cannot be saved
 */
export async function runScrape(
  adapter: SourceAdapter,
  state: ScrapeState,
  options: RunOptions = {}
): Promise<RunResult> {
  const { limit, force = false, onFetched } = options;

  console.log(`\n[${adapter.name}] Discovering documents...`);
  const candidates: CandidateDocument[] = [];
  for await (const candidate of adapter.discover()) {
    candidates.push(candidate);
  }
  console.log(`[${adapter.name}] Found ${candidates.length} candidate(s)`);

  const { toFetch, skipped } = partitionCandidates(candidates, state, force);
  const batch = limit !== undefined ? toFetch.slice(0, Math.max(0, limit)) : toFetch;
  const deferred = toFetch.length - batch.length;

  console.log(
    `[${adapter.name}] ${toFetch.length} to fetch, ${skipped} already acquired` +
      (deferred > 0 ? `, ${deferred} deferred by --limit` : '')
  );

  const result: RunResult = { fetched: [], skipped, deferred, failed: [], unprocessed: [] };

  try {
    for (let i = 0; i < batch.length; i++) {
      const candidate = batch[i];
      const record: DocumentRecord = {
        id: candidate.id,
        source: candidate.source,
        kind: candidate.kind,
        sourceUrl: candidate.url,
        publishedDate: candidate.dateHint,
        title: candidate.title,
        rawBytes: Buffer.alloc(0),
        status: 'discovered',
      };

      console.log(`  [${i + 1}/${batch.length}] ${candidate.kind} ${candidate.url}`);

      try {
        record.rawBytes = await adapter.fetch(candidate);
        record.status = 'fetched';
        result.fetched.push(record);
        console.log(`    ✓ ${record.rawBytes.length} bytes`);
      } catch (e) {
        record.status = 'failed';
        const error = e instanceof Error ? e : new Error(describeError(e));
        if (error instanceof FetchError && error.kind === 'permanent') {
          state.markRejected(candidate.id, error.message);
        }
        result.failed.push({ candidate, error });
        console.log(`    ❌ ${error.message}`);
        continue;
      }

      if (onFetched) {
        try {
          await onFetched(record);
        } catch (e) {
          const error = e instanceof Error ? e : new Error(describeError(e));
          result.unprocessed.push({ candidate, error });
          console.log(`    ↻ Left for the next run: ${error.message}`);
          continue;
        }
      }

      state.markSeen(record.id);
    }
  } finally {
    await state.save();
  }

  return result;
}
