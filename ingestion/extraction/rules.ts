/**
 * Pattern rules for vote extraction.
 *
 * Each rule reads an item's text and returns a tagged result, or null when
 * its pattern does not occur.
 */

import { type Tallies, type VoteChoice, VOTE_CHOICES, emptyTallies } from '../shared/types';

export interface VoteMention {
  rawToken: string;
  choice: VoteChoice;
}

export interface RollCallBlock {
  choice: VoteChoice;
  statedCount: number | null;
  names: string[];
}

export type RuleResult =
  | { kind: 'tally-phrase'; tallies: Tallies }
  | { kind: 'inline-attribution'; mentions: VoteMention[] }
  | { kind: 'roll-call-block'; blocks: RollCallBlock[]; mentions: VoteMention[] };

export type RuleKind = RuleResult['kind'];

const NUMBER_WORDS: Record<string, number> = {
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

const COUNT = `(\\d{1,2}|${Object.keys(NUMBER_WORDS).join('|')})`;

// "8 ayes", "three noes", "1 abstention"
const TALLY_PHRASES: Record<VoteChoice, RegExp> = {
  aye: new RegExp(`\\b${COUNT}\\s+(?:ayes?|yeas?|in\\s+favor)\\b`, 'i'),
  no: new RegExp(`\\b${COUNT}\\s+(?:noes|nays?|nos|no)\\b(?!\\s+(?:longer|later|more|one)\\b)`, 'i'),
  abstain: new RegExp(`\\b${COUNT}\\s+(?:abstentions?|abstaining|abstain(?:s|ed)?)\\b`, 'i'),
  absent: new RegExp(`\\b${COUNT}\\s+absent\\b`, 'i'),
  excused: new RegExp(`\\b${COUNT}\\s+excused\\b`, 'i'),
};

const LABELS: Record<VoteChoice, string> = {
  aye: 'ayes?|yeas?',
  no: 'noes|nays?|no',
  abstain: 'abstentions?|abstaining|abstain(?:s|ed)?',
  absent: 'absent',
  excused: 'excused',
};

const ANY_LABEL = Object.values(LABELS).join('|');

// "Ayes: 11" (a labelled count, optionally followed by names after a dash)
function labelledCount(choice: VoteChoice): RegExp {
  return new RegExp(`(?:^|[\\s(;.,])(?:${LABELS[choice]})\\s*:\\s*${COUNT}\\b(?!\\s*[:/])`, 'i');
}

const LABELLED_COUNTS: Record<VoteChoice, RegExp> = {
  aye: labelledCount('aye'),
  no: labelledCount('no'),
  abstain: labelledCount('abstain'),
  absent: labelledCount('absent'),
  excused: labelledCount('excused'),
};

// "Ayes: 11 - Chan, Dorsey, ..." up to a period, semicolon, blank line, the
// next label, or a line break that does not follow a comma or "and"
const ROLL_CALL_BLOCK = new RegExp(
  `(?:^|[\\s(;.,])(${ANY_LABEL})\\s*:\\s*([\\s\\S]*?)` +
    `(?=\\.(?:\\s|$)|;|\\n\\s*\\n|\\f|(?<![,&][ \\t]*|\\band[ \\t]*)\\n|(?:^|[\\s(,])(?:${ANY_LABEL})\\s*:|$)`,
  'gi'
);

const INLINE_HONORIFIC = '(?:Board\\s+)?(?:Vice\\s+)?(?:Supervisor|President|Chair|Commissioner|Councilmember|Member)';
const NAME = "[A-Z][\\p{L}'’.-]+(?:\\s+[A-Z][\\p{L}'’.-]+){0,2}";

// "Supervisor Preston voted aye", "Supervisor Chan voted to abstain"
const INLINE_VOTE = new RegExp(
  `\\b${INLINE_HONORIFIC}\\s+(${NAME})\\s+voted\\s+(?:to\\s+)?(aye|yes|yea|in\\s+favor|no|nay|against|abstain)\\b`,
  'gu'
);

// "Supervisor Ronen was excused", "Supervisor Safai was absent"
const INLINE_PRESENCE = new RegExp(`\\b${INLINE_HONORIFIC}\\s+(${NAME})\\s+was\\s+(absent|excused)\\b`, 'gu');

const NON_NAMES = /^(?:none|n\/a|nobody|no one)$/i;

function parseCount(value: string): number {
  const word = NUMBER_WORDS[value.toLowerCase()];
  return word !== undefined ? word : Number(value);
}

export function labelToChoice(label: string): VoteChoice {
  const lower = label.toLowerCase();
  for (const choice of VOTE_CHOICES) {
    if (new RegExp(`^(?:${LABELS[choice]})$`, 'i').test(lower)) return choice;
  }
  throw new Error(`Unknown vote label: ${label}`);
}

function phraseToChoice(phrase: string): VoteChoice {
  const lower = phrase.toLowerCase().replace(/\s+/g, ' ');
  if (lower === 'no' || lower === 'nay' || lower === 'against') return 'no';
  if (lower === 'abstain') return 'abstain';
  if (lower === 'absent') return 'absent';
  if (lower === 'excused') return 'excused';
  return 'aye';
}

/**
 * Split a roll-call name list ("President Peskin, Chan and Walton") into tokens.
 */
export function splitNames(list: string): string[] {
  return list
    .replace(/\s+/g, ' ')
    .split(/\s*(?:,|;|\band\b|&)\s*/i)
    .map((name) => name.trim())
    .filter((name) => name.length > 0 && !NON_NAMES.test(name) && /\p{L}/u.test(name));
}

/**
 * Tally-phrase rule: aggregate counts such as "8 ayes, 3 noes" or "Ayes: 11".
 * The first occurrence of each choice wins.
 */
export function tallyPhraseRule(text: string): RuleResult | null {
  const tallies = emptyTallies();
  let found = false;

  for (const choice of VOTE_CHOICES) {
    const match = text.match(TALLY_PHRASES[choice]) ?? text.match(LABELLED_COUNTS[choice]);
    if (match) {
      tallies[choice] = parseCount(match[1]);
      found = true;
    }
  }

  return found ? { kind: 'tally-phrase', tallies } : null;
}

function findMentions(text: string, pattern: RegExp): { index: number; mention: VoteMention }[] {
  return [...text.matchAll(pattern)].map((match) => ({
    index: match.index ?? 0,
    mention: { rawToken: match[1].trim(), choice: phraseToChoice(match[2]) },
  }));
}

function surnameKey(token: string): string {
  const words = token.trim().toLowerCase().split(/\s+/);
  return words[words.length - 1];
}

/**
 * Inline-attribution rule: one mention per "Supervisor X voted Y" sentence,
 * in text order. Attendance sentences ("Supervisor X was excused") are added
 * only when at least one member is recorded as voting.
 */
export function inlineAttributionRule(text: string): RuleResult | null {
  const votes = findMentions(text, INLINE_VOTE);
  if (votes.length === 0) return null;

  const found = [...votes, ...findMentions(text, INLINE_PRESENCE)].sort((a, b) => a.index - b.index);
  return { kind: 'inline-attribution', mentions: found.map((f) => f.mention) };
}

/**
 * Roll-call-block rule: labelled lists such as "Ayes: Chan, Walton." and
 * "Noes: Peskin." with an optional leading count ("Ayes: 11 - ...").
 * Members reported in an attendance sentence and missing from every list
 * become one-name excused or absent blocks.
 */
export function rollCallBlockRule(text: string): RuleResult | null {
  const blocks: RollCallBlock[] = [];

  for (const match of text.matchAll(ROLL_CALL_BLOCK)) {
    const choice = labelToChoice(match[1]);
    let list = match[2].trim();
    let statedCount: number | null = null;

    const countPrefix = list.match(new RegExp(`^${COUNT}\\b\\s*(?:[-–—:]\\s*)?`, 'i'));
    if (countPrefix) {
      statedCount = parseCount(countPrefix[1]);
      list = list.slice(countPrefix[0].length);
    }

    const names = splitNames(list);
    // "Ayes: 11", "Noes: 0" and "Noes: None" name nobody; counts are the tally rule's
    if (names.length === 0) continue;

    blocks.push({ choice, statedCount, names });
  }

  if (blocks.length === 0) return null;

  const listed = new Set(blocks.flatMap((block) => block.names.map(surnameKey)));
  for (const { mention } of findMentions(text, INLINE_PRESENCE)) {
    if (listed.has(surnameKey(mention.rawToken))) continue;
    listed.add(surnameKey(mention.rawToken));
    blocks.push({ choice: mention.choice, statedCount: null, names: [mention.rawToken] });
  }

  const mentions = blocks.flatMap((block) =>
    block.names.map((rawToken) => ({ rawToken, choice: block.choice }))
  );
  return { kind: 'roll-call-block', blocks, mentions };
}

/**
 * Attribution rules in cascade order. The first one with a result wins.
 */
export const ATTRIBUTION_RULES: readonly ((text: string) => RuleResult | null)[] = [
  inlineAttributionRule,
  rollCallBlockRule,
];
