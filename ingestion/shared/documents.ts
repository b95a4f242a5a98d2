/**
 * Local archive of fetched meeting PDFs.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { DocumentRecord } from './types';

/**
 * Archive location for a document: `<pdfDir>/<source>/<id>.pdf`.
 */
export function getArchivePath(pdfDir: string, record: Pick<DocumentRecord, 'source' | 'id'>): string {
  return path.join(pdfDir, record.source, `${record.id}.pdf`);
}

/**
 * Save a fetched document's bytes locally.
 *
 * @returns Path of the saved file
 */
export async function archiveDocument(record: DocumentRecord, pdfDir: string): Promise<string> {
  const filepath = getArchivePath(pdfDir, record);

  try {
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    await fs.writeFile(filepath, record.rawBytes);
  } catch (error) {
    throw new Error(`Failed to archive ${record.id}: ${error}`);
  }

  return filepath;
}

/**
 * Read a PDF from disk, e.g. one archived by a previous run.
 */
export async function readPdf(filepath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filepath);
  } catch (error) {
    throw new Error(`Failed to read ${filepath}: ${error}`);
  }
}
