import type { SourceAdapter } from '../sources/types';
import { identify } from '../scraping/identity';
import type { CandidateDocument, DocumentKind, MemberIdentity } from '../shared/types';
import { MemberResolver } from '../members/resolver';

export function makeCandidate(
  n: number,
  kind: DocumentKind = 'minutes',
  dateHint: Date | null = new Date(Date.UTC(2025, 2, n))
): CandidateDocument {
  const url = `https://example.test/meetings/doc-${n}.pdf`;
  return { id: identify(url, kind, dateHint), source: 'fake', url, kind, dateHint };
}

/**
 * In-process source: lists fixed candidates and serves fixed bytes.
 */
export class FakeSource implements SourceAdapter {
  readonly name = 'fake';
  readonly fetchCalls: string[] = [];

  constructor(
    private candidates: CandidateDocument[],
    private failures: Map<string, Error> = new Map(),
    private bodies: Map<string, Buffer> = new Map()
  ) {}

  async *discover(): AsyncIterable<CandidateDocument> {
    yield* this.candidates;
  }

  async fetch(candidate: CandidateDocument): Promise<Buffer> {
    this.fetchCalls.push(candidate.id);
    const failure = this.failures.get(candidate.id);
    if (failure) throw failure;
    return this.bodies.get(candidate.id) ?? Buffer.from(`%PDF ${candidate.url}`);
  }
}

export function member(canonicalName: string, aliases: string[] = [], districtOrSeat: number | null = null): MemberIdentity {
  return { canonicalName, aliases, districtOrSeat };
}

/** Four-member roster used across extraction tests */
export function smallRoster(): MemberResolver {
  return new MemberResolver([
    member('Connie Chan', [], 1),
    member('Shamann Walton', [], 10),
    member('Rafael Mandelman', ['Raf Mandelman'], 8),
    member('Aaron Peskin', ['President Peskin'], 3),
  ]);
}
