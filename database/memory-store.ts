/**
 * In-process LegislativeStore used by tests and `--no-store` dry runs.
 */

import type { LegislationItem, VoteRecord } from '@/ingestion/shared/types';
import { type LegislativeStore, type StoredDocument, meetingKeyOf } from './client';

export interface StoredItem {
  id: string;
  documentId: string;
  item: LegislationItem;
}

export class InMemoryStore implements LegislativeStore {
  readonly documents = new Map<string, StoredDocument>();
  readonly items = new Map<string, StoredItem>();
  readonly votes = new Map<string, VoteRecord[]>();
  private nextItemId = 1;

  async upsertDocument(document: StoredDocument): Promise<string> {
    this.documents.set(document.record.id, document);
    return document.record.id;
  }

  async upsertItem(item: LegislationItem, documentId: string): Promise<string> {
    const naturalKey = `${meetingKeyOf(item.meetingDate, documentId)}|${item.key}`;
    const existing = this.items.get(naturalKey);
    const id = existing ? existing.id : String(this.nextItemId++);
    this.items.set(naturalKey, { id, documentId, item });
    return id;
  }

  async replaceVotes(itemId: string, votes: VoteRecord[]): Promise<void> {
    this.votes.set(itemId, [...votes]);
  }

  voteCount(): number {
    let total = 0;
    for (const votes of this.votes.values()) total += votes.length;
    return total;
  }
}
