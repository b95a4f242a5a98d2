import { describe, expect, it } from 'vitest';
import { identify } from './identity';

const URL = 'https://sfbos.org/sites/default/files/bag030425_minutes.pdf';

describe('identify', () => {
  it('returns the same id for the same tuple', () => {
    const date = new Date(Date.UTC(2025, 2, 4));
    expect(identify(URL, 'minutes', date)).toBe(identify(URL, 'minutes', new Date(Date.UTC(2025, 2, 4))));
  });

  it('returns a 16-character hex id', () => {
    expect(identify(URL, 'minutes', null)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('ignores the time of day', () => {
    const morning = new Date(Date.UTC(2025, 2, 4, 8, 30));
    const evening = new Date(Date.UTC(2025, 2, 4, 20, 15));
    expect(identify(URL, 'minutes', morning)).toBe(identify(URL, 'minutes', evening));
  });

  it('distinguishes kind, date and url', () => {
    const date = new Date(Date.UTC(2025, 2, 4));
    const base = identify(URL, 'minutes', date);

    expect(identify(URL, 'agenda', date)).not.toBe(base);
    expect(identify(URL, 'minutes', new Date(Date.UTC(2025, 2, 11)))).not.toBe(base);
    expect(identify(URL, 'minutes', null)).not.toBe(base);
    expect(identify(`${URL}?v=2`, 'minutes', date)).not.toBe(base);
  });

  it('trims surrounding whitespace from the url', () => {
    expect(identify(`  ${URL}\n`, 'agenda', null)).toBe(identify(URL, 'agenda', null));
  });
});
