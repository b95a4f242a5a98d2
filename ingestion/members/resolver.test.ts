import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { RosterLoadError } from '../shared/errors';
import { member, smallRoster } from '../test-support/fixtures';
import { MemberResolver, cleanMemberToken } from './resolver';

function canonicalOf(resolver: MemberResolver, token: string): string | null {
  const resolution = resolver.resolve(token);
  return resolution.status === 'resolved' ? resolution.member.canonicalName : null;
}

describe('cleanMemberToken', () => {
  it.each([
    ['Supervisor Chan', 'Chan'],
    ['Supervisors Chan.', 'Chan'],
    ['Board President Peskin', 'Peskin'],
    ['Vice President Walton', 'Walton'],
    ['  11 - Mandelman,', 'Mandelman'],
    ['Dr.  Rafael   Mandelman', 'Rafael Mandelman'],
  ])('cleans %s', (raw, cleaned) => {
    expect(cleanMemberToken(raw)).toBe(cleaned);
  });
});

describe('MemberResolver', () => {
  const resolver = smallRoster();

  it('matches the exact canonical name', () => {
    expect(canonicalOf(resolver, 'Rafael Mandelman')).toBe('Rafael Mandelman');
  });

  it('matches aliases case-insensitively', () => {
    expect(canonicalOf(resolver, 'raf mandelman')).toBe('Rafael Mandelman');
  });

  it('matches bare surnames after stripping honorifics', () => {
    expect(canonicalOf(resolver, 'MANDELMAN')).toBe('Rafael Mandelman');
    expect(canonicalOf(resolver, 'Supervisor Walton')).toBe('Shamann Walton');
    expect(canonicalOf(resolver, 'President Peskin')).toBe('Aaron Peskin');
  });

  it('ignores accents', () => {
    const accented = new MemberResolver([member('Ahsha Safai')]);
    expect(canonicalOf(accented, 'Safaí')).toBe('Ahsha Safai');
  });

  it('keeps unknown names unresolved with no candidates', () => {
    expect(resolver.resolve('Supervisor Smith')).toEqual({
      status: 'unresolved',
      rawToken: 'Supervisor Smith',
      candidates: [],
    });
  });

  it('does not guess between members who share a surname', () => {
    const shared = new MemberResolver([member('Connie Chan'), member('Jordan Chan'), member('Shamann Walton')]);

    const resolution = shared.resolve('Chan');

    expect(resolution.status).toBe('unresolved');
    expect(resolution.status === 'unresolved' && resolution.candidates.map((m) => m.canonicalName)).toEqual([
      'Connie Chan',
      'Jordan Chan',
    ]);
  });

  it('still resolves a shared surname by full name', () => {
    const shared = new MemberResolver([member('Connie Chan'), member('Jordan Chan')]);
    expect(canonicalOf(shared, 'Jordan Chan')).toBe('Jordan Chan');
  });

  it('does not match a multi-word token on its last word alone', () => {
    expect(canonicalOf(resolver, 'Janet Walton')).toBeNull();
  });

  it('freezes the roster', () => {
    expect(Object.isFrozen(resolver.members)).toBe(true);
    expect(Object.isFrozen(resolver.members[0])).toBe(true);
  });

  describe('fromFile', () => {
    it('loads the bundled roster', async () => {
      const roster = await MemberResolver.fromFile(path.resolve(process.cwd(), 'data/members.json'));

      expect(roster.members).toHaveLength(11);
      expect(canonicalOf(roster, 'Dorsey')).toBe('Matt Dorsey');
      expect(canonicalOf(roster, 'Supervisor Safaí')).toBe('Ahsha Safai');
    });

    it('throws RosterLoadError for a missing file', async () => {
      await expect(MemberResolver.fromFile('/nonexistent/members.json')).rejects.toBeInstanceOf(RosterLoadError);
    });

    it('throws RosterLoadError for an empty roster', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'roster-'));
      const rosterPath = path.join(dir, 'members.json');
      await fs.writeFile(rosterPath, JSON.stringify({ members: [] }), 'utf8');

      try {
        await expect(MemberResolver.fromFile(rosterPath)).rejects.toThrow(`Failed to load member roster from ${rosterPath}`);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });
});
