import type pdfParse from 'pdf-parse';

const TOP_OF_PAGE = 800;
const LINE_HEIGHT = 12;

/**
 * Stand-in for pdf-parse: feeds each page to the `pagerender` callback as
 * one text run per line, the way pdf.js reports a simple text layer.
 */
export async function fakePdfParse(pages: string[], options?: pdfParse.Options): Promise<pdfParse.Result> {
  let text = '';

  for (const page of pages) {
    const items = page.split('\n').map((str, line) => ({
      str,
      transform: [1, 0, 0, 1, 72, TOP_OF_PAGE - line * LINE_HEIGHT],
    }));
    const pageData = { getTextContent: async () => ({ items }) };
    const rendered = options?.pagerender ? options.pagerender(pageData) : page;
    text += `\n\n${await rendered}`;
  }

  return { text, numpages: pages.length, numrender: pages.length, info: {}, metadata: null, version: 'default' };
}
