#!/usr/bin/env tsx
/**
 * CLI for the board votes ingestion pipeline
 *
 * Provides commands for discovering and fetching meeting documents and for
 * extracting legislative items and roll-call votes from them.
 * Exits with 1 only when a run cannot start or its shared state fails;
 * per-document failures are reported in the summary.
 */

import { config } from 'dotenv';
import { resolve } from 'path';

// Load environment variables from .env.local
config({ path: resolve(process.cwd(), '.env.local') });

import { Command, InvalidArgumentError, Option } from 'commander';
import { DatabaseClient } from '@/database/client';
import { type IngestionConfig, loadConfig } from './config';
import { MemberResolver } from './members/resolver';
import { IngestionPipeline, extractDocument, printSummary } from './pipeline';
import { runScrape } from './scraping/orchestrator';
import { ScrapeState } from './scraping/state';
import { archiveDocument, readPdf } from './shared/documents';
import { describeError } from './shared/errors';
import type { DocumentKind } from './shared/types';
import { SOURCE_NAMES, type SourceName, createSource } from './sources';
import { parseDate } from './sources/dates';

interface SourceOptions {
  source: SourceName;
}

interface BatchOptions extends SourceOptions {
  limit?: number;
  force: boolean;
  reset: boolean;
}

interface RunCommandOptions extends BatchOptions {
  store: boolean;
}

interface ExtractCommandOptions {
  kind: DocumentKind;
  date?: Date;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return limit;
}

function parseDateOption(value: string): Date {
  const date = parseDate(value);
  if (!date) {
    throw new InvalidArgumentError('Expected a date such as 2025-03-18.');
  }
  return date;
}

const sourceOption = () =>
  new Option('--source <name>', 'Document source').choices([...SOURCE_NAMES]).default('sfbos');

function printHeader(title: string, settings: IngestionConfig): void {
  console.log(`\n${'='.repeat(80)}`);
  console.log(title);
  console.log('='.repeat(80));
  console.log(`State directory: ${settings.stateDir}`);
  console.log(`PDF directory: ${settings.pdfDir}`);
}

const program = new Command();

program
  .name('board-votes')
  .description('Board of Supervisors agenda and minutes ingestion tools')
  .version('0.1.0');

// Discover command (lists candidates without fetching or touching state)
program
  .command('discover')
  .description('List agenda and minutes documents published by a source')
  .addOption(sourceOption())
  .action(async (options: SourceOptions) => {
    const settings = loadConfig();
    const adapter = createSource(options.source, settings);
    const state = await ScrapeState.load(adapter.name, { stateDir: settings.stateDir });

    let total = 0;
    let pending = 0;
    for await (const candidate of adapter.discover()) {
      total++;
      const status = state.contains(candidate.id) ? 'seen' : state.isRejected(candidate.id) ? 'rejected' : 'new';
      if (status === 'new') pending++;
      const date = candidate.dateHint ? candidate.dateHint.toISOString().slice(0, 10) : 'undated';
      console.log(`  [${status}] ${date} ${candidate.kind.padEnd(7)} ${candidate.url}`);
    }

    console.log(`\n${total} document(s) listed, ${pending} not yet acquired`);
  });

// Fetch command (acquire and archive PDFs only)
program
  .command('fetch')
  .description('Fetch new documents and save them to the PDF directory')
  .addOption(sourceOption())
  .option('--limit <n>', 'Maximum number of documents to fetch', parseLimit)
  .option('--force', 'Re-fetch documents that were already acquired', false)
  .option('--reset', 'Start from an empty scrape state (also recovers a corrupt state file)', false)
  .action(async (options: BatchOptions) => {
    const settings = loadConfig();
    const adapter = createSource(options.source, settings);

    printHeader(`FETCHING DOCUMENTS: ${adapter.name}`, settings);
    const state = await ScrapeState.load(adapter.name, { stateDir: settings.stateDir, reset: options.reset });
    console.log(`Previously acquired: ${state.size}`);

    // An archive failure leaves the document unmarked for the next run
    const result = await runScrape(adapter, state, {
      limit: options.limit,
      force: options.force,
      onFetched: async (record) => {
        const filepath = await archiveDocument(record, settings.pdfDir);
        console.log(`    Saved ${filepath}`);
      },
    });

    const saved = result.fetched.length - result.unprocessed.length;
    console.log(`\n${'='.repeat(80)}`);
    console.log('COMPLETE');
    console.log(`  ✓ Fetched: ${result.fetched.length} (${saved} saved)`);
    console.log(`  ⏭️  Skipped: ${result.skipped}`);
    if (result.deferred > 0) console.log(`  ⏸️  Deferred: ${result.deferred}`);
    console.log(`  ✗ Failed: ${result.failed.length + result.unprocessed.length}`);
    for (const { candidate, error } of [...result.failed, ...result.unprocessed]) {
      console.log(`      ${candidate.url}: ${error.message}`);
    }
    console.log('='.repeat(80));
  });

// Run command (fetch, extract and store)
program
  .command('run')
  .description('Fetch new documents, extract items and votes, and store them')
  .addOption(sourceOption())
  .option('--limit <n>', 'Maximum number of documents to fetch', parseLimit)
  .option('--force', 'Re-fetch and re-extract documents that were already acquired', false)
  .option('--reset', 'Start from an empty scrape state (also recovers a corrupt state file)', false)
  .option('--no-store', 'Extract without writing to the database')
  .action(async (options: RunCommandOptions) => {
    const settings = loadConfig();
    const adapter = createSource(options.source, settings);

    printHeader(`INGESTING MEETINGS: ${adapter.name}`, settings);

    const resolver = await MemberResolver.fromFile(settings.rosterPath);
    console.log(`Roster: ${resolver.members.length} member(s)`);

    const store = options.store ? new DatabaseClient(settings.supabaseUrl, settings.supabaseKey) : null;
    if (!store) {
      console.log('--no-store enabled: results will not be written to the database.');
    }

    const state = await ScrapeState.load(adapter.name, { stateDir: settings.stateDir, reset: options.reset });
    console.log(`Previously acquired: ${state.size}`);

    const pipeline = new IngestionPipeline(resolver, { pdfDir: settings.pdfDir, store });
    const summary = await pipeline.run(adapter, state, { limit: options.limit, force: options.force });

    printSummary(summary);
  });

// Reset command
program
  .command('reset')
  .description('Forget every acquired document for a source')
  .addOption(sourceOption())
  .action(async (options: SourceOptions) => {
    const settings = loadConfig();
    const state = await ScrapeState.load(options.source, { stateDir: settings.stateDir, reset: true });
    await state.save();
    console.log(`✓ Cleared scrape state at ${state.statePath}`);
  });

// Extract command (local file, outputs JSON)
program
  .command('extract')
  .description('Extract items and votes from a local PDF (outputs JSON)')
  .argument('<pdf>', 'Path to a meeting PDF')
  .addOption(new Option('--kind <kind>', 'Document kind').choices(['agenda', 'minutes']).default('minutes'))
  .option('--date <date>', 'Meeting date when the document does not state one', parseDateOption)
  .action(async (pdf: string, options: ExtractCommandOptions) => {
    const settings = loadConfig();
    const resolver = await MemberResolver.fromFile(settings.rosterPath);
    const rawBytes = await readPdf(pdf);

    const { meetingDate, items } = await extractDocument(
      rawBytes,
      { kind: options.kind, publishedDate: options.date ?? null },
      resolver
    );

    console.log(JSON.stringify({ meetingDate, items }, null, 2));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`\n❌ ${describeError(error)}`);
  process.exit(1);
});
