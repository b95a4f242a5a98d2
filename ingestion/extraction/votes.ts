/**
 * Vote extraction for one item span.
 *
 * Process:
 * 1. Read stated tallies ("8 ayes, 3 noes") with the tally-phrase rule
 * 2. Run the attribution cascade; the first rule with a result wins
 * 3. Resolve every mention against the roster, keeping unresolved tokens
 * 4. Apply the closed-world absence convention to roll-call blocks
 * 5. Reconcile stated and attributed counts into annotations
 */

import type { MemberResolver } from '../members/resolver';
import {
  type ItemAnnotation,
  type LegislationResult,
  type Tallies,
  type VoteChoice,
  type VoteRecord,
  VOTE_CHOICES,
  emptyTallies,
} from '../shared/types';
import { ATTRIBUTION_RULES, type RuleKind, type RuleResult, tallyPhraseRule } from './rules';
import { type ItemSpan, spanText } from './segmenter';

export interface VoteExtraction {
  tallies: Tallies;
  votes: VoteRecord[];
  /** Attribution rule that produced the votes, or 'tally-phrase' when only counts were found */
  rule: RuleKind | null;
  annotations: ItemAnnotation[];
}

const RESULT_KEYWORDS: { pattern: RegExp; result: LegislationResult }[] = [
  { pattern: /\b(?:approved|passed|adopted)\b/gi, result: 'approved' },
  { pattern: /\b(?:rejected|failed|defeated)\b/gi, result: 'rejected' },
  { pattern: /\b(?:continued|withdrawn|tabled|referred)\b/gi, result: 'pending' },
];

/**
 * Outcome of an item from its disposition keywords. The last keyword in the
 * text decides, since minutes record earlier motions before the final action.
 */
export function extractResult(text: string): LegislationResult {
  let result: LegislationResult = 'unknown';
  let lastIndex = -1;

  for (const { pattern, result: candidate } of RESULT_KEYWORDS) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      if (index > lastIndex) {
        lastIndex = index;
        result = candidate;
      }
    }
  }

  return result;
}

/**
 * Count votes by choice.
 */
export function countVotes(votes: VoteRecord[]): Record<VoteChoice, number> {
  const counts: Record<VoteChoice, number> = { aye: 0, no: 0, abstain: 0, absent: 0, excused: 0 };
  for (const vote of votes) {
    counts[vote.choice]++;
  }
  return counts;
}

function toRecords(itemKey: string, attribution: RuleResult, resolver: MemberResolver): VoteRecord[] {
  if (attribution.kind === 'tally-phrase') return [];

  return attribution.mentions.map(({ rawToken, choice }) => {
    const resolution = resolver.resolve(rawToken);
    if (resolution.status === 'resolved') {
      return {
        itemKey,
        memberName: resolution.member.canonicalName,
        choice,
        rawToken,
        unresolved: false,
        candidates: [],
        inferred: false,
      };
    }
    return {
      itemKey,
      memberName: rawToken,
      choice,
      rawToken,
      unresolved: true,
      candidates: resolution.candidates.map((member) => member.canonicalName),
      inferred: false,
    };
  });
}

/**
 * Roster members not named in any roll-call block are absent. Members an
 * ambiguous token might refer to are left out rather than guessed.
 */
function inferAbsences(itemKey: string, votes: VoteRecord[], resolver: MemberResolver): VoteRecord[] {
  const accounted = new Set<string>();
  for (const vote of votes) {
    if (vote.unresolved) {
      vote.candidates.forEach((name) => accounted.add(name));
    } else {
      accounted.add(vote.memberName);
    }
  }

  return resolver.members
    .filter((member) => !accounted.has(member.canonicalName))
    .map((member) => ({
      itemKey,
      memberName: member.canonicalName,
      choice: 'absent' as const,
      rawToken: '',
      unresolved: false,
      candidates: [],
      inferred: true,
    }));
}

function findConflicts(votes: VoteRecord[]): ItemAnnotation[] {
  const choicesByMember = new Map<string, VoteChoice[]>();
  for (const vote of votes) {
    if (vote.unresolved) continue;
    const choices = choicesByMember.get(vote.memberName) ?? [];
    if (!choices.includes(vote.choice)) choices.push(vote.choice);
    choicesByMember.set(vote.memberName, choices);
  }

  const annotations: ItemAnnotation[] = [];
  for (const [memberName, choices] of choicesByMember) {
    if (choices.length > 1) {
      annotations.push({ type: 'conflicting-vote', memberName, choices });
    }
  }
  return annotations;
}

function findMismatches(stated: Tallies, votes: VoteRecord[]): ItemAnnotation[] {
  const attributed = countVotes(votes);
  const annotations: ItemAnnotation[] = [];

  for (const choice of VOTE_CHOICES) {
    const statedCount = stated[choice];
    if (statedCount !== null && statedCount !== attributed[choice]) {
      annotations.push({ type: 'vote-count-mismatch', choice, stated: statedCount, attributed: attributed[choice] });
    }
  }
  return annotations;
}

/**
 * Combine stated and attributed counts. Stated counts win; missing ones come
 * from the votes. A roll call accounts for every member, so all of its counts
 * are known; inline attribution only tells us about the choices it mentions.
 */
function finalTallies(stated: Tallies | null, votes: VoteRecord[], rule: RuleKind | null): Tallies {
  const tallies = stated ? { ...stated } : emptyTallies();
  if (votes.length === 0) return tallies;

  const attributed = countVotes(votes);
  for (const choice of VOTE_CHOICES) {
    if (tallies[choice] !== null) continue;
    if (rule === 'roll-call-block' || attributed[choice] > 0) {
      tallies[choice] = attributed[choice];
    }
  }
  return tallies;
}

/**
 * Extract tallies and per-member votes for one item.
 *
 * An item with no vote language yields empty tallies and no votes.
 */
export function extractVotes(
  span: ItemSpan,
  fullText: string,
  resolver: MemberResolver,
  itemKey: string
): VoteExtraction {
  const text = spanText(fullText, span);
  const stated = tallyPhraseRule(text);
  const statedTallies = stated?.kind === 'tally-phrase' ? stated.tallies : null;

  let attribution: RuleResult | null = null;
  for (const rule of ATTRIBUTION_RULES) {
    attribution = rule(text);
    if (attribution) break;
  }

  const votes = attribution ? toRecords(itemKey, attribution, resolver) : [];
  if (attribution?.kind === 'roll-call-block') {
    votes.push(...inferAbsences(itemKey, votes, resolver));
  }

  const annotations: ItemAnnotation[] = [];
  if (statedTallies && votes.length > 0) {
    annotations.push(...findMismatches(statedTallies, votes));
  }
  annotations.push(...findConflicts(votes));

  const rule: RuleKind | null = attribution ? attribution.kind : statedTallies ? 'tally-phrase' : null;

  return {
    tallies: finalTallies(statedTallies, votes, rule),
    votes,
    rule,
    annotations,
  };
}
