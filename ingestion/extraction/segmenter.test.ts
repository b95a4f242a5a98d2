import { describe, expect, it } from 'vitest';
import { frontMatter, matchHeading, segment, spanText } from './segmenter';

const MINUTES = [
  'BOARD OF SUPERVISORS',
  'Tuesday, March 4, 2025',
  'File No. 250210',
  'Ordinance amending the Planning Code.',
  '12. 250211 [Budget and Appropriation]',
  'Ordinance appropriating funds.',
  'Item 13.',
  'Hearing on homelessness services.',
].join('\n');

describe('matchHeading', () => {
  it.each([
    ['File No. 250210', { fileNumber: '250210', itemNumber: null, title: null }],
    ['File #250210', { fileNumber: '250210', itemNumber: null, title: null }],
    ['  File No 250210 (continued)', { fileNumber: '250210', itemNumber: null, title: null }],
    ['12. 250210 [Budget and Appropriation]', { fileNumber: '250210', itemNumber: 12, title: 'Budget and Appropriation' }],
    ['12. [250210] Resolution approving a lease', { fileNumber: '250210', itemNumber: 12, title: null }],
    ['3) 250210', { fileNumber: '250210', itemNumber: 3, title: null }],
    ['Item 13.', { fileNumber: null, itemNumber: 13, title: null }],
  ])('recognizes %s', (line, heading) => {
    expect(matchHeading(line)).toEqual(heading);
  });

  it.each(['The motion passed, 8 ayes, 3 noes.', '2025. Annual report', '12. Approval of minutes'])(
    'ignores %s',
    (line) => {
      expect(matchHeading(line)).toBeNull();
    }
  );
});

describe('segment', () => {
  it('splits the text at item headings', () => {
    const spans = segment(MINUTES);

    expect(spans.map((span) => [span.fileNumber, span.itemNumber, span.title])).toEqual([
      ['250210', null, null],
      ['250211', 12, 'Budget and Appropriation'],
      [null, 13, null],
    ]);
    expect(spans[0].startOffset).toBe(MINUTES.indexOf('File No. 250210'));
    expect(spans[0].endOffset).toBe(spans[1].startOffset);
    expect(spans[2].endOffset).toBe(MINUTES.length);
  });

  it('keeps each span to its own item', () => {
    const spans = segment(MINUTES);

    expect(spanText(MINUTES, spans[1])).toBe('12. 250211 [Budget and Appropriation]\nOrdinance appropriating funds.\n');
  });

  it('returns no spans for text without headings', () => {
    expect(segment('Roll call.\nAll members present.')).toEqual([]);
  });

  it('returns the text before the first item as front matter', () => {
    expect(frontMatter(MINUTES, segment(MINUTES))).toBe('BOARD OF SUPERVISORS\nTuesday, March 4, 2025\n');
  });
});
