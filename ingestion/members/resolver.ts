/**
 * Maps raw member mentions ("Supervisor Chan", "MANDELMAN", "Raf Mandelman")
 * onto the canonical roster.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { RosterLoadError } from '../shared/errors';
import type { MemberIdentity } from '../shared/types';

const rosterSchema = z.object({
  body: z.string().optional(),
  members: z
    .array(
      z.object({
        canonicalName: z.string().min(1),
        aliases: z.array(z.string()).default([]),
        districtOrSeat: z.number().int().nullable().default(null),
      })
    )
    .min(1),
});

const HONORIFICS =
  /^(?:(?:board\s+)?(?:vice\s+)?(?:president|chair(?:person|woman|man)?)|supervisors?|commissioners?|council\s*members?|members?|mr|mrs|ms|mx|dr)\.?\s+/i;

export type Resolution =
  | { status: 'resolved'; member: MemberIdentity }
  | { status: 'unresolved'; rawToken: string; candidates: MemberIdentity[] };

/**
 * Strip honorifics, punctuation noise and extra whitespace from a mention.
 */
export function cleanMemberToken(rawToken: string): string {
  let token = rawToken
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[^\p{L}]+|[^\p{L}.]+$/gu, '')
    .replace(/\.$/, '');

  let previous: string;
  do {
    previous = token;
    token = token.replace(HONORIFICS, '').trim();
  } while (token !== previous);

  return token;
}

function foldCase(value: string): string {
  return value.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

function surnameOf(name: string): string {
  const parts = name.trim().split(/\s+/);
  return parts[parts.length - 1];
}

/**
 * Resolves mentions against a fixed roster.
 *
 * Matching order: exact canonical name, alias (case-insensitive), then bare
 * surname (case-insensitive). A surname shared by several members is never
 * guessed: the mention stays unresolved with every candidate attached.
 */
export class MemberResolver {
  readonly members: readonly MemberIdentity[];
  private byCanonical = new Map<string, MemberIdentity>();
  private byAlias = new Map<string, MemberIdentity[]>();
  private bySurname = new Map<string, MemberIdentity[]>();

  constructor(members: MemberIdentity[]) {
    this.members = Object.freeze(
      members.map((member) => Object.freeze({ ...member, aliases: [...member.aliases] }))
    );

    for (const member of this.members) {
      this.byCanonical.set(member.canonicalName, member);

      for (const name of [member.canonicalName, ...member.aliases]) {
        addTo(this.byAlias, foldCase(cleanMemberToken(name)), member);
      }
      addTo(this.bySurname, foldCase(surnameOf(member.canonicalName)), member);
    }
  }

  /**
   * Load and validate the roster JSON file.
   *
   * @throws {RosterLoadError} If the file is missing or malformed
   */
  static async fromFile(rosterPath: string): Promise<MemberResolver> {
    try {
      const raw = await fs.readFile(rosterPath, 'utf8');
      const roster = rosterSchema.parse(JSON.parse(raw));
      return new MemberResolver(roster.members);
    } catch (error) {
      throw new RosterLoadError(rosterPath, error);
    }
  }

  resolve(rawToken: string): Resolution {
    const token = cleanMemberToken(rawToken);
    const unresolved = (candidates: MemberIdentity[] = []): Resolution => ({
      status: 'unresolved',
      rawToken,
      candidates,
    });

    if (!token) return unresolved();

    const exact = this.byCanonical.get(token);
    if (exact) return { status: 'resolved', member: exact };

    const folded = foldCase(token);

    const aliasMatches = this.byAlias.get(folded) ?? [];
    if (aliasMatches.length === 1) return { status: 'resolved', member: aliasMatches[0] };
    if (aliasMatches.length > 1) return unresolved(aliasMatches);

    if (!folded.includes(' ')) {
      const surnameMatches = this.bySurname.get(folded) ?? [];
      if (surnameMatches.length === 1) return { status: 'resolved', member: surnameMatches[0] };
      if (surnameMatches.length > 1) return unresolved(surnameMatches);
    }

    return unresolved();
  }
}

function addTo(index: Map<string, MemberIdentity[]>, key: string, member: MemberIdentity): void {
  if (!key) return;
  const existing = index.get(key) ?? [];
  if (!existing.includes(member)) existing.push(member);
  index.set(key, existing);
}
