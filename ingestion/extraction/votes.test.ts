import { describe, expect, it } from 'vitest';
import { MemberResolver } from '../members/resolver';
import { member, smallRoster } from '../test-support/fixtures';
import { segment } from './segmenter';
import { countVotes, extractResult, extractVotes } from './votes';

function extractFirst(text: string, resolver: MemberResolver) {
  const [span] = segment(text);
  return extractVotes(span, text, resolver, span.fileNumber ?? `item-${span.itemNumber}`);
}

describe('extractVotes', () => {
  it('keeps tally-only items without votes', () => {
    const text = 'File No. 250210\nOrdinance amending the Administrative Code.\n8 ayes, 3 noes — APPROVED';

    const extraction = extractFirst(text, smallRoster());

    expect(extraction).toEqual({
      tallies: { aye: 8, no: 3, abstain: null, absent: null, excused: null },
      votes: [],
      rule: 'tally-phrase',
      annotations: [],
    });
  });

  it('keeps labelled counts as tallies without inventing votes', () => {
    const roster = new MemberResolver([
      member('Connie Chan'),
      member('Shamann Walton'),
      member('Rafael Mandelman'),
      member('Matt Dorsey'),
    ]);
    const text = 'File No. 250210\nOrdinance.\nAyes: 4, Noes: 0.\nAPPROVED';

    const extraction = extractFirst(text, roster);

    expect(extraction).toEqual({
      tallies: { aye: 4, no: 0, abstain: null, absent: null, excused: null },
      votes: [],
      rule: 'tally-phrase',
      annotations: [],
    });
  });

  it('keeps the roll call when an attendance sentence comes first', () => {
    const text = 'File No. 250211\nOrdinance.\nSupervisor Peskin was excused.\nAyes: Chan, Walton, Mandelman.\nPASSED';

    const extraction = extractFirst(text, smallRoster());

    expect(extraction.rule).toBe('roll-call-block');
    expect(extraction.votes.map((v) => [v.memberName, v.choice, v.inferred])).toEqual([
      ['Connie Chan', 'aye', false],
      ['Shamann Walton', 'aye', false],
      ['Rafael Mandelman', 'aye', false],
      ['Aaron Peskin', 'excused', false],
    ]);
    expect(extraction.tallies).toEqual({ aye: 3, no: 0, abstain: 0, absent: 0, excused: 1 });
    expect(extraction.annotations).toEqual([]);
  });

  it('records unnamed roster members as absent after a roll call', () => {
    const roster = new MemberResolver([
      member('Connie Chan'),
      member('Shamann Walton'),
      member('Rafael Mandelman'),
      member('Matt Dorsey'),
    ]);
    const text = 'File No. 250300\nResolution approving a lease.\nAyes: Chan, Walton, Mandelman. Noes: Peskin.';

    const extraction = extractFirst(text, roster);

    const vote = (memberName: string, choice: string, rawToken: string, unresolved = false, inferred = false) => ({
      itemKey: '250300',
      memberName,
      choice,
      rawToken,
      unresolved,
      candidates: [],
      inferred,
    });
    expect(extraction.rule).toBe('roll-call-block');
    expect(extraction.votes).toEqual([
      vote('Connie Chan', 'aye', 'Chan'),
      vote('Shamann Walton', 'aye', 'Walton'),
      vote('Rafael Mandelman', 'aye', 'Mandelman'),
      vote('Peskin', 'no', 'Peskin', true),
      vote('Matt Dorsey', 'absent', '', false, true),
    ]);
    expect(extraction.tallies).toEqual({ aye: 3, no: 1, abstain: 0, absent: 1, excused: 0 });
    expect(extraction.annotations).toEqual([]);
  });

  it('agrees with a consistent stated tally', () => {
    const text =
      'File No. 250400\nOrdinance.\nAYES: 3 - Chan, Walton and Mandelman\nNOES: 1 - Peskin\nFINALLY PASSED';

    const extraction = extractFirst(text, smallRoster());

    expect(extraction.tallies).toEqual({ aye: 3, no: 1, abstain: 0, absent: 0, excused: 0 });
    expect(countVotes(extraction.votes).aye).toBe(extraction.tallies.aye);
    expect(extraction.annotations).toEqual([]);
  });

  it('annotates stated counts that disagree with the roll call', () => {
    const text = 'File No. 250500\nMotion.\n8 ayes, 1 noes\nAyes: Chan, Walton, Mandelman. Noes: Peskin.';

    const extraction = extractFirst(text, smallRoster());

    expect(extraction.annotations).toEqual([{ type: 'vote-count-mismatch', choice: 'aye', stated: 8, attributed: 3 }]);
    expect(extraction.tallies.aye).toBe(8);
    expect(extraction.votes).toHaveLength(4);
  });

  it('uses inline attribution before roll-call blocks and never merges them', () => {
    const text = 'Item 4.\nSupervisor Chan voted no.\nAyes: Walton.';

    const extraction = extractFirst(text, smallRoster());

    expect(extraction.rule).toBe('inline-attribution');
    expect(extraction.votes.map((v) => [v.memberName, v.choice])).toEqual([['Connie Chan', 'no']]);
    expect(extraction.tallies).toEqual({ aye: null, no: 1, abstain: null, absent: null, excused: null });
  });

  it('keeps one record per mention, resolved or not', () => {
    const roster = new MemberResolver([member('Connie Chan'), member('Jordan Chan'), member('Shamann Walton')]);
    const text = 'Item 5.\nAyes: Chan, Walton, Smith.';

    const extraction = extractFirst(text, roster);

    expect(extraction.votes.filter((v) => !v.inferred)).toHaveLength(3);
    expect(extraction.votes.map((v) => [v.memberName, v.unresolved, v.candidates])).toEqual([
      ['Chan', true, ['Connie Chan', 'Jordan Chan']],
      ['Shamann Walton', false, []],
      ['Smith', true, []],
    ]);
  });

  it('does not infer absence for members behind an ambiguous name', () => {
    const roster = new MemberResolver([member('Connie Chan'), member('Jordan Chan'), member('Matt Dorsey')]);

    const extraction = extractFirst('Item 6.\nAyes: Chan.', roster);

    expect(extraction.votes.filter((v) => v.inferred).map((v) => v.memberName)).toEqual(['Matt Dorsey']);
  });

  it('annotates a member recorded with two different choices', () => {
    const text = 'Item 7.\nSupervisor Chan voted aye. Supervisor Chan voted no.';

    const extraction = extractFirst(text, smallRoster());

    expect(extraction.votes).toHaveLength(2);
    expect(extraction.annotations).toEqual([
      { type: 'conflicting-vote', memberName: 'Connie Chan', choices: ['aye', 'no'] },
    ]);
  });

  it('returns empty results for items without votes', () => {
    const extraction = extractFirst('Item 8.\nHearing on transit services. Heard and filed.', smallRoster());

    expect(extraction).toEqual({
      tallies: { aye: null, no: null, abstain: null, absent: null, excused: null },
      votes: [],
      rule: null,
      annotations: [],
    });
  });
});

describe('extractResult', () => {
  it.each([
    ['8 ayes, 3 noes — APPROVED', 'approved'],
    ['Ordinance FINALLY PASSED', 'approved'],
    ['The motion to amend failed. The ordinance was then adopted.', 'approved'],
    ['The ordinance was adopted, then the motion to reconsider was defeated.', 'rejected'],
    ['Continued to March 11, 2025.', 'pending'],
    ['Referred without recommendation.', 'pending'],
    ['Hearing held.', 'unknown'],
  ])('reads %s', (text, result) => {
    expect(extractResult(text)).toBe(result);
  });
});
