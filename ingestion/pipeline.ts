/**
 * End-to-end ingestion: acquire new documents, normalize, extract, persist.
 *
 * Every per-document failure is turned into a recorded outcome, so one bad
 * PDF never stops the rest of the batch. A PDF without usable text is final;
 * any other processing failure (archive, store) leaves the document unmarked
 * so the next run fetches it again. Only shared infrastructure (state file,
 * roster, discovery) aborts a run.
 */

import type { LegislativeStore } from '@/database/client';
import { buildItems, resolveMeetingDate } from './extraction/items';
import type { MemberResolver } from './members/resolver';
import { runScrape } from './scraping/orchestrator';
import type { ScrapeState } from './scraping/state';
import { archiveDocument } from './shared/documents';
import { FetchError, UnreadablePdfError, describeError } from './shared/errors';
import type { DocumentKind, DocumentRecord, LegislationItem } from './shared/types';
import type { SourceAdapter } from './sources/types';
import { type NormalizedDocument, TextExtractor } from './text-extraction/extractor';

export interface PipelineOptions {
  /** Archive fetched PDFs under this directory */
  pdfDir?: string | null;
  /** Persist documents, items and votes; null runs extraction only */
  store?: LegislativeStore | null;
  extractor?: TextExtractor;
}

export interface RunPipelineOptions {
  limit?: number;
  force?: boolean;
}

export interface DocumentFailure {
  id: string;
  url: string;
  stage: 'fetch' | 'process';
  error: string;
  /** The document was left unmarked and the next run tries it again */
  retryable: boolean;
}

export interface ExtractedDocument {
  normalized: NormalizedDocument;
  meetingDate: Date | null;
  items: LegislationItem[];
}

export interface PipelineSummary {
  source: string;
  fetched: number;
  skipped: number;
  deferred: number;
  processed: number;
  failed: DocumentFailure[];
  items: number;
  votes: number;
  itemsWithMismatches: number;
  unresolvedMentions: number;
}

/**
 * Normalize a PDF and extract its items.
 *
 * @throws {UnreadablePdfError} If the PDF has no usable text
 */
export async function extractDocument(
  rawBytes: Buffer,
  source: { kind: DocumentKind; publishedDate: Date | null },
  resolver: MemberResolver,
  extractor: TextExtractor = new TextExtractor()
): Promise<ExtractedDocument> {
  const normalized = await extractor.normalize(rawBytes);
  const meetingDate = resolveMeetingDate(normalized.text, source.publishedDate);
  const items = buildItems(normalized.text, { kind: source.kind, publishedDate: meetingDate }, resolver);
  return { normalized, meetingDate, items };
}

export class IngestionPipeline {
  private resolver: MemberResolver;
  private pdfDir: string | null;
  private store: LegislativeStore | null;
  private extractor: TextExtractor;

  constructor(resolver: MemberResolver, options: PipelineOptions = {}) {
    this.resolver = resolver;
    this.pdfDir = options.pdfDir ?? null;
    this.store = options.store ?? null;
    this.extractor = options.extractor ?? new TextExtractor();
  }

  /**
   * Process one fetched document.
   *
   * @returns Extracted items
   * @throws If any stage fails for this document
   */
  async processDocument(record: DocumentRecord): Promise<LegislationItem[]> {
    if (this.pdfDir) {
      await archiveDocument(record, this.pdfDir);
    }

    const { normalized, meetingDate, items } = await extractDocument(
      record.rawBytes,
      record,
      this.resolver,
      this.extractor
    );
    console.log(`    Extracted ${items.length} item(s) from ${normalized.pageCount} page(s)`);

    if (this.store) {
      const documentId = await this.store.upsertDocument({
        record,
        meetingDate,
        text: normalized.text,
        markdown: normalized.markdown,
      });

      for (const item of items) {
        const itemId = await this.store.upsertItem(item, documentId);
        await this.store.replaceVotes(itemId, item.votes);
      }
      console.log(`    ✓ Stored ${items.length} item(s)`);
    }

    return items;
  }

  /**
   * Acquire new documents from a source and process each one as it arrives.
   */
  async run(adapter: SourceAdapter, state: ScrapeState, options: RunPipelineOptions = {}): Promise<PipelineSummary> {
    const summary: PipelineSummary = {
      source: adapter.name,
      fetched: 0,
      skipped: 0,
      deferred: 0,
      processed: 0,
      failed: [],
      items: 0,
      votes: 0,
      itemsWithMismatches: 0,
      unresolvedMentions: 0,
    };

    const result = await runScrape(adapter, state, {
      limit: options.limit,
      force: options.force,
      onFetched: async (record) => {
        try {
          const items = await this.processDocument(record);
          summary.processed++;
          summary.items += items.length;
          for (const item of items) {
            summary.votes += item.votes.length;
            if (item.annotations.some((annotation) => annotation.type === 'vote-count-mismatch')) {
              summary.itemsWithMismatches++;
            }
            summary.unresolvedMentions += item.votes.filter((vote) => vote.unresolved).length;
          }
        } catch (error) {
          const retryable = !(error instanceof UnreadablePdfError);
          console.log(`    ❌ ${describeError(error)}`);
          summary.failed.push({
            id: record.id,
            url: record.sourceUrl,
            stage: 'process',
            error: describeError(error),
            retryable,
          });
          if (retryable) throw error;
        }
      },
    });

    summary.fetched = result.fetched.length;
    summary.skipped = result.skipped;
    summary.deferred = result.deferred;
    summary.failed.unshift(
      ...result.failed.map(({ candidate, error }) => ({
        id: candidate.id,
        url: candidate.url,
        stage: 'fetch' as const,
        error: error.message,
        retryable: !(error instanceof FetchError && error.kind === 'permanent'),
      }))
    );

    return summary;
  }
}

/**
 * Print the run summary block.
 */
export function printSummary(summary: PipelineSummary): void {
  console.log(`\n${'='.repeat(80)}`);
  console.log(`COMPLETE [${summary.source}]`);
  console.log(`  ✓ Fetched: ${summary.fetched}`);
  console.log(`  ✓ Processed: ${summary.processed}`);
  console.log(`  ⏭️  Skipped: ${summary.skipped}`);
  if (summary.deferred > 0) console.log(`  ⏸️  Deferred: ${summary.deferred}`);
  console.log(`  ✗ Failed: ${summary.failed.length}`);
  for (const failure of summary.failed) {
    const retry = failure.retryable ? ', will retry' : '';
    console.log(`      [${failure.stage}${retry}] ${failure.url}: ${failure.error}`);
  }
  console.log(`  Items: ${summary.items} (${summary.votes} votes)`);
  console.log(`  Items with vote-count mismatches: ${summary.itemsWithMismatches}`);
  console.log(`  Unresolved member mentions: ${summary.unresolvedMentions}`);
  console.log('='.repeat(80));
}
