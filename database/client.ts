/**
 * Database class for interacting with Supabase.
 *
 * Stores meetings, source documents, legislative items and roll-call votes.
 * Every write is an idempotent upsert on a natural key, so re-running the
 * pipeline over the same documents leaves the tables unchanged.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { type DocumentRecord, type LegislationItem, type VoteRecord, toIsoDate } from '@/ingestion/shared/types';

/**
 * Normalized document content handed to the store
 */
export interface StoredDocument {
  record: DocumentRecord;
  meetingDate: Date | null;
  text: string;
  markdown: string;
}

/**
 * Persistence collaborator used by the pipeline.
 */
export interface LegislativeStore {
  /** Upsert a document (and its meeting), returning the document id */
  upsertDocument(document: StoredDocument): Promise<string>;
  /** Upsert an item keyed on (meeting, item key), returning the item row id */
  upsertItem(item: LegislationItem, documentId: string): Promise<string>;
  /** Replace every vote of an item */
  replaceVotes(itemId: string, votes: VoteRecord[]): Promise<void>;
}

const idRowSchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) });

/**
 * Scope items are unique within: the meeting day, or the document itself
 * when the meeting date is unknown.
 */
export function meetingKeyOf(meetingDate: Date | null, documentId: string): string {
  return meetingDate ? toIsoDate(meetingDate) : `document:${documentId}`;
}

/**
 * Database wrapper for all Supabase operations.
 */
export class DatabaseClient implements LegislativeStore {
  private _client: SupabaseClient;

  /**
   * Initialize the database connection.
   *
   * @param supabaseUrl - Supabase project URL (defaults to env var SUPABASE_URL)
   * @param supabaseKey - Supabase API key (defaults to env var SUPABASE_KEY)
   * @throws {Error} If credentials are not provided
   */
  constructor(supabaseUrl?: string, supabaseKey?: string) {
    const url = supabaseUrl || process.env.SUPABASE_URL;
    const key = supabaseKey || process.env.SUPABASE_KEY;

    if (!url || !key) {
      throw new Error(
        'Supabase credentials not found. ' +
          'Set SUPABASE_URL and SUPABASE_KEY environment variables or pass them as arguments.'
      );
    }

    this._client = createClient(url, key);
  }

  /**
   * Get or create the meeting for a date.
   *
   * @returns Meeting id
   */
  async getOrCreateMeeting(meetingDate: Date): Promise<string> {
    const date = toIsoDate(meetingDate);

    try {
      const { data: existingData, error: selectError } = await this._client
        .from('meetings')
        .select('id')
        .eq('meeting_date', date);

      if (selectError) throw selectError;

      const existing = z.array(idRowSchema).parse(existingData ?? []);
      if (existing.length > 0) {
        return existing[0].id;
      }

      const { data: insertData, error: insertError } = await this._client
        .from('meetings')
        .insert({ meeting_date: date })
        .select('id')
        .single();

      if (insertError) throw insertError;
      if (!insertData) throw new Error('Failed to create meeting');

      return idRowSchema.parse(insertData).id;
    } catch (error) {
      throw new Error(`Failed to get or create meeting: ${error}`);
    }
  }

  async upsertDocument(document: StoredDocument): Promise<string> {
    const { record, meetingDate, text, markdown } = document;

    try {
      const meetingId = meetingDate ? await this.getOrCreateMeeting(meetingDate) : null;

      const { data, error } = await this._client
        .from('documents')
        .upsert(
          {
            id: record.id,
            source: record.source,
            kind: record.kind,
            source_url: record.sourceUrl,
            published_date: record.publishedDate ? toIsoDate(record.publishedDate) : null,
            title: record.title ?? null,
            meeting_id: meetingId,
            content_text: text,
            content_markdown: markdown,
          },
          { onConflict: 'id' }
        )
        .select('id')
        .single();

      if (error) throw error;
      if (!data) throw new Error('No row returned');

      return idRowSchema.parse(data).id;
    } catch (error) {
      throw new Error(`Failed to upsert document: ${error}`);
    }
  }

  async upsertItem(item: LegislationItem, documentId: string): Promise<string> {
    try {
      const { data, error } = await this._client
        .from('legislation_items')
        .upsert(
          {
            meeting_key: meetingKeyOf(item.meetingDate, documentId),
            item_key: item.key,
            document_id: documentId,
            file_number: item.fileNumber,
            item_number: item.itemNumber,
            title: item.title,
            meeting_date: item.meetingDate ? toIsoDate(item.meetingDate) : null,
            description: item.description,
            aye_count: item.tallies.aye,
            no_count: item.tallies.no,
            abstain_count: item.tallies.abstain,
            absent_count: item.tallies.absent,
            excused_count: item.tallies.excused,
            result: item.result,
            annotations: item.annotations,
          },
          { onConflict: 'meeting_key,item_key' }
        )
        .select('id')
        .single();

      if (error) throw error;
      if (!data) throw new Error('No row returned');

      return idRowSchema.parse(data).id;
    } catch (error) {
      throw new Error(`Failed to upsert item ${item.key}: ${error}`);
    }
  }

  async replaceVotes(itemId: string, votes: VoteRecord[]): Promise<void> {
    try {
      const { error: deleteError } = await this._client.from('votes').delete().eq('item_id', itemId);
      if (deleteError) throw deleteError;

      if (votes.length === 0) return;

      const { error: insertError } = await this._client.from('votes').insert(
        votes.map((vote) => ({
          item_id: itemId,
          member_name: vote.memberName,
          choice: vote.choice,
          raw_token: vote.rawToken,
          unresolved: vote.unresolved,
          candidates: vote.candidates,
          inferred: vote.inferred,
        }))
      );
      if (insertError) throw insertError;
    } catch (error) {
      throw new Error(`Failed to replace votes: ${error}`);
    }
  }
}
