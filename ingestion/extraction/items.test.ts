import { describe, expect, it } from 'vitest';
import { smallRoster } from '../test-support/fixtures';
import { buildItems, itemKeyOf, resolveMeetingDate } from './items';

const AGENDA = [
  'BOARD OF SUPERVISORS',
  'March 4, 2025',
  '1. 250100 [Budget and Appropriation]',
  'Ordinance appropriating funds.',
  '8 ayes, 3 noes',
  '2. 250101',
  'Resolution urging transit service.',
].join('\n');

describe('buildItems', () => {
  it('extracts a tally-only minutes item', () => {
    const text = 'File No. 250210\nOrdinance amending the Administrative Code.\n8 ayes, 3 noes — APPROVED';

    const items = buildItems(text, { kind: 'minutes', publishedDate: new Date(Date.UTC(2025, 2, 4)) }, smallRoster());

    expect(items).toEqual([
      {
        key: '250210',
        fileNumber: '250210',
        itemNumber: null,
        title: 'Ordinance amending the Administrative Code.',
        meetingDate: new Date(Date.UTC(2025, 2, 4)),
        description: 'Ordinance amending the Administrative Code. 8 ayes, 3 noes — APPROVED',
        tallies: { aye: 8, no: 3, abstain: null, absent: null, excused: null },
        result: 'approved',
        votes: [],
        annotations: [],
      },
    ]);
  });

  it('keeps agenda items pending without votes', () => {
    const items = buildItems(AGENDA, { kind: 'agenda', publishedDate: null }, smallRoster());

    expect(items.map((item) => [item.key, item.itemNumber, item.title, item.description, item.result])).toEqual([
      ['250100', 1, 'Budget and Appropriation', 'Ordinance appropriating funds. 8 ayes, 3 noes', 'pending'],
      ['250101', 2, 'Resolution urging transit service.', 'Resolution urging transit service.', 'pending'],
    ]);
    expect(items[0].tallies).toEqual({ aye: null, no: null, abstain: null, absent: null, excused: null });
    expect(items[0].votes).toEqual([]);
  });

  it('reads the meeting date from the front matter when the listing has none', () => {
    const items = buildItems(AGENDA, { kind: 'agenda', publishedDate: null }, smallRoster());

    expect(items[0].meetingDate).toEqual(new Date(Date.UTC(2025, 2, 4)));
  });

  it('keeps the occurrence of a repeated file number with the most vote evidence', () => {
    const text = [
      'File No. 250210',
      'Ordinance amending the Administrative Code.',
      'File No. 250210',
      'Ordinance amending the Administrative Code.',
      '8 ayes, 3 noes — APPROVED',
    ].join('\n');

    const items = buildItems(text, { kind: 'minutes', publishedDate: null }, smallRoster());

    expect(items).toHaveLength(1);
    expect(items[0].tallies.aye).toBe(8);
  });

  it('returns no items for text without headings', () => {
    expect(buildItems('Roll call. All members present.', { kind: 'minutes', publishedDate: null }, smallRoster())).toEqual(
      []
    );
  });
});

describe('itemKeyOf', () => {
  it('uses the file number, then the item number, then the position', () => {
    const span = { title: null, startOffset: 0, endOffset: 0 };

    expect(itemKeyOf({ ...span, fileNumber: '250210', itemNumber: 3 }, 1)).toBe('250210');
    expect(itemKeyOf({ ...span, fileNumber: null, itemNumber: 7 }, 1)).toBe('item-7');
    expect(itemKeyOf({ ...span, fileNumber: null, itemNumber: null }, 4)).toBe('item-4');
  });
});

describe('resolveMeetingDate', () => {
  it('prefers the listed date', () => {
    const listed = new Date(Date.UTC(2025, 2, 11));
    expect(resolveMeetingDate(AGENDA, listed)).toBe(listed);
  });
});
